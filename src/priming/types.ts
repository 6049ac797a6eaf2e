/**
 * Priming Data Model
 *
 * Immutable value types shared by the recognizer and dialog providers and
 * the per-turn context stack. Aggregates are frozen on construction; build
 * them with `createAggregate()` or the merge helpers in ./merge.ts.
 */

// ============================================================================
// Value Types
// ============================================================================

/**
 * A named conversational goal. `source` identifies the compiled model the
 * intent came from, so identical names from two models stay distinct.
 */
export interface Intent {
  readonly name: string;
  readonly source: string;
}

/**
 * A named extractable value type. `id` disambiguates pattern entities that
 * share a name.
 */
export interface Entity {
  readonly name: string;
  readonly id?: string;
  readonly source?: string;
}

export interface VocabularyEntry {
  readonly canonicalForm: string;
  /** Alternate forms, first-seen order */
  readonly synonyms: readonly string[];
}

export interface VocabularyList {
  /** Entity key the vocabulary extends (the entity name) */
  readonly entity: string;
  readonly entries: readonly VocabularyEntry[];
}

export interface PrimingAggregate {
  readonly intents: readonly Intent[];
  readonly entities: readonly Entity[];
  readonly vocabularyLists: ReadonlyMap<string, VocabularyList>;
}

/**
 * What the voice channel sees for the innermost active dialog.
 */
export interface InputContext {
  readonly locale: string;
  readonly possible: PrimingAggregate;
  readonly expected: PrimingAggregate;
}

// ============================================================================
// Constructors & Keys
// ============================================================================

export function intent(name: string, source: string): Intent {
  return Object.freeze({ name, source });
}

export function entity(name: string, options: { id?: string; source?: string } = {}): Entity {
  const value: { name: string; id?: string; source?: string } = { name };
  if (options.id !== undefined) value.id = options.id;
  if (options.source !== undefined) value.source = options.source;
  return Object.freeze(value);
}

export function vocabularyEntry(canonicalForm: string, synonyms: readonly string[]): VocabularyEntry {
  return Object.freeze({ canonicalForm, synonyms: Object.freeze([...synonyms]) });
}

export function vocabularyList(entityName: string, entries: readonly VocabularyEntry[]): VocabularyList {
  return Object.freeze({ entity: entityName, entries: Object.freeze([...entries]) });
}

export function intentKey(value: Intent): string {
  return JSON.stringify([value.name, value.source]);
}

/** Missing id/source count as "" so `entity("x")` and `entity("x", { id: "" })` collide */
export function entityKey(value: Entity): string {
  return JSON.stringify([value.name, value.id ?? "", value.source ?? ""]);
}
