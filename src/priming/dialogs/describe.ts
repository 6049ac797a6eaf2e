/**
 * Dialog Priming Provider
 *
 * describeDialog() returns the priming aggregate a dialog contributes.
 * For an adaptive dialog that is its "Possible" universe: the recognizer's
 * description merged with every statically reachable child, whatever
 * triggers are enabled at runtime.
 */

import { EMPTY_AGGREGATE, createAggregate, mergeAggregates, unionStrings } from "../merge.js";
import { DialogNotFoundError, UnsupportedDialogKindError, describeKind } from "../errors.js";
import { describeRecognizer } from "../recognizers/describe.js";
import { entity, vocabularyEntry, vocabularyList, type Entity, type PrimingAggregate } from "../types.js";
import { childDialogs } from "./dialog-set.js";
import type { AdaptiveDialog, Choice, ChoiceInput, ChoiceRecognizerOptions, Dialog, DialogContext } from "./types.js";

const NUMBER_ENTITY = 'number';
const ORDINAL_ENTITY = 'ordinal';
const BOOLEAN_ENTITY = 'boolean';

const DEFAULT_CHOICE_OPTIONS: Required<ChoiceRecognizerOptions> = {
  noValue: false,
  noAction: false,
  recognizeNumbers: true,
  recognizeOrdinals: true,
};

export function describeDialog(dialog: Dialog, dialogContext: DialogContext, locale?: string): PrimingAggregate {
  return describeWithin(dialog, dialogContext, locale, new Set());
}

/**
 * `visited` holds dialog ids already folded into the aggregate being
 * built, so shared children count once and reference cycles terminate.
 */
function describeWithin(
  dialog: Dialog,
  dialogContext: DialogContext,
  locale: string | undefined,
  visited: Set<string>,
): PrimingAggregate {
  switch (dialog.kind) {
    case 'number_input':
      return createAggregate({ entities: [entity(NUMBER_ENTITY)] });

    case 'confirm_input':
      return createAggregate({ entities: [entity(BOOLEAN_ENTITY)] });

    case 'choice_input':
      return describeChoiceInput(dialog);

    case 'adaptive':
      return describeAdaptive(dialog, dialogContext, locale, visited);

    // No priming signal of their own
    case 'text_input':
    case 'attachment_input':
    case 'date_time_input':
    case 'send_activity':
    case 'ask':
    case 'end_dialog':
    case 'set_property':
    case 'if_condition':
    case 'switch_condition':
    case 'foreach':
    case 'begin_dialog':
      return EMPTY_AGGREGATE;

    default:
      throw new UnsupportedDialogKindError(describeKind(dialog));
  }
}

// ============================================================================
// Choice Input
// ============================================================================

export function resolveChoiceOptions(options: ChoiceRecognizerOptions = {}): Required<ChoiceRecognizerOptions> {
  return {
    noValue: options.noValue ?? DEFAULT_CHOICE_OPTIONS.noValue,
    noAction: options.noAction ?? DEFAULT_CHOICE_OPTIONS.noAction,
    recognizeNumbers: options.recognizeNumbers ?? DEFAULT_CHOICE_OPTIONS.recognizeNumbers,
    recognizeOrdinals: options.recognizeOrdinals ?? DEFAULT_CHOICE_OPTIONS.recognizeOrdinals,
  };
}

function choiceSynonyms(choice: Choice, options: Required<ChoiceRecognizerOptions>): readonly string[] {
  const leading: string[] = [];
  if (!options.noValue) {
    leading.push(choice.value);
  }
  const title = choice.action?.title;
  if (!options.noAction && title) {
    leading.push(title);
  }
  return unionStrings(leading, choice.synonyms ?? []);
}

function describeChoiceInput(dialog: ChoiceInput): PrimingAggregate {
  const options = resolveChoiceOptions(dialog.recognizerOptions);

  const entities: Entity[] = [];
  if (options.recognizeNumbers) entities.push(entity(NUMBER_ENTITY));
  if (options.recognizeOrdinals) entities.push(entity(ORDINAL_ENTITY));

  // The list is keyed by the dialog's own id so each choice prompt primes
  // its own vocabulary
  const list = vocabularyList(
    dialog.id,
    dialog.choices.map((choice) => vocabularyEntry(choice.value, choiceSynonyms(choice, options))),
  );

  return createAggregate({ entities, vocabularyLists: [list] });
}

// ============================================================================
// Adaptive (composite) Dialog
// ============================================================================

function describeAdaptive(
  dialog: AdaptiveDialog,
  dialogContext: DialogContext,
  locale: string | undefined,
  visited: Set<string>,
): PrimingAggregate {
  visited.add(dialog.id);

  const parts: PrimingAggregate[] = [];
  if (dialog.recognizer) {
    parts.push(describeRecognizer(dialog.recognizer, locale));
  }

  const pending = childDialogs(dialog);
  while (pending.length > 0) {
    const child = pending.shift();
    if (child === undefined || visited.has(child.id)) {
      continue;
    }
    visited.add(child.id);
    parts.push(describeWithin(child, dialogContext, locale, visited));
    // Nested adaptive dialogs walked their own subtree above
    if (child.kind !== 'adaptive') {
      pending.unshift(...reachableFrom(child, dialogContext));
    }
  }

  return mergeAggregates(...parts);
}

function reachableFrom(dialog: Dialog, dialogContext: DialogContext): Dialog[] {
  if (dialog.kind !== 'begin_dialog') {
    return childDialogs(dialog);
  }
  const target = dialogContext.findDialog(dialog.dialog);
  if (!target) {
    throw new DialogNotFoundError(dialog.dialog);
  }
  return [target];
}
