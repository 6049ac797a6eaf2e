/**
 * Recognizer definitions
 *
 * Closed tagged union over every recognizer kind the priming provider
 * understands. Adding a kind means adding a variant here and a branch in
 * describeRecognizer().
 */

import type { Entity, Intent } from "../types.js";

export const PREBUILT_ENTITY_TYPES = [
  'age',
  'channelMention',
  'boolean',
  'currency',
  'datetime',
  'dimension',
  'email',
  'guid',
  'hashtag',
  'ip',
  'mention',
  'number',
  'numberrange',
  'ordinal',
  'percentage',
  'phonenumber',
  'temperature',
  'url',
] as const;

export type PrebuiltEntityType = (typeof PREBUILT_ENTITY_TYPES)[number];

interface RecognizerBase {
  id?: string;
}

export interface PrebuiltEntityRecognizer extends RecognizerBase {
  kind: 'prebuilt_entity';
  entity: PrebuiltEntityType;
}

export interface RegexEntityRecognizer extends RecognizerBase {
  kind: 'regex_entity';
  /** Entity name produced on match */
  name: string;
  /** Also the entity id: disambiguates pattern entities that share a name */
  id?: string;
  patterns?: string[];
}

export interface DynamicListElement {
  canonicalForm: string;
  synonyms?: string[];
}

export interface DynamicList {
  /** Entity the list extends */
  entity: string;
  list: DynamicListElement[];
}

/**
 * Recognizer bound to a compiled NLU model. Intents and entities are
 * tagged with the model's source by the tooling that produced them.
 */
export interface NluModelRecognizer extends RecognizerBase {
  kind: 'nlu_model';
  applicationId?: string;
  possibleIntents?: Intent[];
  possibleEntities?: Entity[];
  dynamicLists?: DynamicList[];
}

export interface FaqRecognizer extends RecognizerBase {
  kind: 'faq';
  knowledgeBaseId?: string;
}

export interface RecognizerSet extends RecognizerBase {
  kind: 'recognizer_set';
  recognizers: Recognizer[];
}

export interface CrossTrainedRecognizerSet extends RecognizerBase {
  kind: 'cross_trained_set';
  recognizers: Recognizer[];
}

export interface MultiLanguageRecognizer extends RecognizerBase {
  kind: 'multi_language';
  /** Children keyed by locale; "" is the default entry */
  recognizers: Record<string, Recognizer>;
}

export type Recognizer =
  | PrebuiltEntityRecognizer
  | RegexEntityRecognizer
  | NluModelRecognizer
  | FaqRecognizer
  | RecognizerSet
  | CrossTrainedRecognizerSet
  | MultiLanguageRecognizer;

export type RecognizerKind = Recognizer['kind'];
