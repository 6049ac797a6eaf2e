/**
 * Recognizer Description Provider
 *
 * describeRecognizer() walks a recognizer tree and returns the priming
 * aggregate it can contribute. Pure and synchronous: the same tree and
 * locale always produce an equal aggregate.
 */

import { EMPTY_AGGREGATE, createAggregate, mergeAggregates, unionStrings } from "../merge.js";
import { UnsupportedRecognizerKindError, describeKind } from "../errors.js";
import { entity, vocabularyEntry, vocabularyList, type PrimingAggregate, type VocabularyList } from "../types.js";
import type { DynamicList, MultiLanguageRecognizer, NluModelRecognizer, Recognizer } from "./types.js";

/** Key of the multi-language entry used when no locale matches */
export const DEFAULT_LOCALE_KEY = "";

export function describeRecognizer(recognizer: Recognizer, locale?: string): PrimingAggregate {
  switch (recognizer.kind) {
    case 'prebuilt_entity':
      return createAggregate({ entities: [entity(recognizer.entity)] });

    case 'regex_entity':
      return createAggregate({ entities: [entity(recognizer.name, { id: recognizer.id })] });

    case 'nlu_model':
      return describeNluModel(recognizer);

    // FAQ knowledge bases carry no intent/entity schema
    case 'faq':
      return EMPTY_AGGREGATE;

    // Cross-training changes runtime disambiguation only, never priming
    case 'recognizer_set':
    case 'cross_trained_set':
      return mergeAggregates(...recognizer.recognizers.map((child) => describeRecognizer(child, locale)));

    case 'multi_language': {
      const selected = selectLanguageRecognizer(recognizer, locale);
      return selected ? describeRecognizer(selected, locale) : EMPTY_AGGREGATE;
    }

    default:
      throw new UnsupportedRecognizerKindError(describeKind(recognizer));
  }
}

/**
 * Exact locale match, then the default ("") entry.
 */
export function selectLanguageRecognizer(
  recognizer: MultiLanguageRecognizer,
  locale: string | undefined,
): Recognizer | undefined {
  if (locale !== undefined && Object.hasOwn(recognizer.recognizers, locale)) {
    return recognizer.recognizers[locale];
  }
  if (Object.hasOwn(recognizer.recognizers, DEFAULT_LOCALE_KEY)) {
    return recognizer.recognizers[DEFAULT_LOCALE_KEY];
  }
  return undefined;
}

// The instance is bound to one compiled model, so locale plays no part here
function describeNluModel(recognizer: NluModelRecognizer): PrimingAggregate {
  return createAggregate({
    intents: recognizer.possibleIntents ?? [],
    entities: recognizer.possibleEntities ?? [],
    vocabularyLists: (recognizer.dynamicLists ?? []).map(toVocabularyList),
  });
}

/**
 * Dynamic list elements prime their canonical form as well as their
 * synonyms, so the canonical form leads the synonym list.
 */
export function toVocabularyList(list: DynamicList): VocabularyList {
  return vocabularyList(
    list.entity,
    list.list.map((element) =>
      vocabularyEntry(element.canonicalForm, unionStrings([element.canonicalForm], element.synonyms ?? [])),
    ),
  );
}
