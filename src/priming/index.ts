/**
 * Priming barrel export
 *
 * Recognizer and dialog description providers, the merge algebra they
 * share, and the per-turn context stack.
 */

// Data model
export type {
  Intent,
  Entity,
  VocabularyEntry,
  VocabularyList,
  PrimingAggregate,
  InputContext,
} from "./types.js";
export { intent, entity, vocabularyEntry, vocabularyList, intentKey, entityKey } from "./types.js";

// Merge algebra
export {
  EMPTY_AGGREGATE,
  createAggregate,
  isEmptyAggregate,
  mergeAggregates,
  mergeEntries,
  mergeVocabularyLists,
  unionEntities,
  unionIntents,
  unionStrings,
} from "./merge.js";
export type { AggregateParts } from "./merge.js";

// Errors
export {
  PrimingError,
  StackMismatchError,
  UnsupportedRecognizerKindError,
  UnsupportedDialogKindError,
  SchemaBindingMissingError,
  DialogNotFoundError,
  DuplicateDialogIdError,
  isPrimingError,
} from "./errors.js";
export type { PrimingErrorCode } from "./errors.js";

// Recognizers
export type * from "./recognizers/types.js";
export { PREBUILT_ENTITY_TYPES } from "./recognizers/types.js";
export { describeRecognizer, selectLanguageRecognizer, toVocabularyList, DEFAULT_LOCALE_KEY } from "./recognizers/describe.js";

// Dialogs
export type * from "./dialogs/types.js";
export { describeDialog, resolveChoiceOptions } from "./dialogs/describe.js";
export { DialogSet, childDialogs, createDialogContext } from "./dialogs/dialog-set.js";
export { boundEntityNames, narrowToProperties } from "./dialogs/schema.js";

// Context stack
export { PrimingContextStack } from "./context/stack.js";
export type { ContextFrame, DialogRef, BeginOptions, PrimingContextStackOptions } from "./context/stack.js";
export { PrimingTurn, getContextStack } from "./context/turn.js";
export type { TurnState, TurnHooks, TurnEndOptions, PrimingTurnOptions, StackOptions } from "./context/turn.js";
export { serialiseAggregate, serialiseInputContext, serialiseFrame } from "./context/serialise.js";
export type { WireAggregate, WireInputContext, WireFrame } from "./context/serialise.js";

// Declarative definitions
export { RecognizerSchema, DialogDefinitionSchema, PropertySchemaDefinition, parseRecognizer, parseDialog } from "./declarative/schemas.js";
