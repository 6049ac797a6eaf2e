/**
 * Merge Algebra
 *
 * Pure set-union helpers over priming aggregates. Every function returns a
 * new frozen value and leaves its inputs untouched.
 *
 * Rules:
 * - intents union by (name, source); first occurrence wins
 * - entities union by (name, id, source); first occurrence wins
 * - vocabulary lists union by entity key; lists for the same key
 *   concatenate their entries in contributor order, and entries sharing a
 *   canonical form union their synonyms in first-seen order
 */

import {
  entity,
  entityKey,
  intent,
  intentKey,
  vocabularyEntry,
  vocabularyList,
  type Entity,
  type Intent,
  type PrimingAggregate,
  type VocabularyEntry,
  type VocabularyList,
} from "./types.js";

// ============================================================================
// Primitive Unions
// ============================================================================

function unionBy<T>(items: Iterable<T>, keyOf: (item: T) => string): T[] {
  const seen = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (!seen.has(key)) {
      seen.set(key, item);
    }
  }
  return [...seen.values()];
}

export function unionIntents(...groups: ReadonlyArray<readonly Intent[]>): readonly Intent[] {
  return Object.freeze(unionBy(groups.flat(), intentKey).map((i) => intent(i.name, i.source)));
}

export function unionEntities(...groups: ReadonlyArray<readonly Entity[]>): readonly Entity[] {
  return Object.freeze(unionBy(groups.flat(), entityKey).map((e) => entity(e.name, { id: e.id, source: e.source })));
}

/**
 * Union string sequences, keeping first-seen order and dropping exact
 * duplicates.
 */
export function unionStrings(...groups: ReadonlyArray<readonly string[]>): readonly string[] {
  return Object.freeze([...new Set(groups.flat())]);
}

/**
 * Collapse entries that share a canonical form. The surviving entry sits
 * where its canonical form was first seen.
 */
export function mergeEntries(entries: Iterable<VocabularyEntry>): readonly VocabularyEntry[] {
  const byCanonical = new Map<string, string[][]>();
  for (const entry of entries) {
    const groups = byCanonical.get(entry.canonicalForm);
    if (groups) {
      groups.push([...entry.synonyms]);
    } else {
      byCanonical.set(entry.canonicalForm, [[...entry.synonyms]]);
    }
  }

  const merged: VocabularyEntry[] = [];
  for (const [canonicalForm, groups] of byCanonical) {
    merged.push(vocabularyEntry(canonicalForm, unionStrings(...groups)));
  }
  return Object.freeze(merged);
}

/**
 * Union vocabulary lists by entity key, in contributor order.
 */
export function mergeVocabularyLists(lists: Iterable<VocabularyList>): ReadonlyMap<string, VocabularyList> {
  const entriesByEntity = new Map<string, VocabularyEntry[]>();
  for (const list of lists) {
    const entries = entriesByEntity.get(list.entity);
    if (entries) {
      entries.push(...list.entries);
    } else {
      entriesByEntity.set(list.entity, [...list.entries]);
    }
  }

  const merged = new Map<string, VocabularyList>();
  for (const [entityName, entries] of entriesByEntity) {
    merged.set(entityName, vocabularyList(entityName, mergeEntries(entries)));
  }
  return merged;
}

// ============================================================================
// Aggregates
// ============================================================================

export interface AggregateParts {
  intents?: readonly Intent[];
  entities?: readonly Entity[];
  vocabularyLists?: Iterable<VocabularyList>;
}

/**
 * Build a frozen aggregate, applying the same dedup rules as a merge.
 */
export function createAggregate(parts: AggregateParts = {}): PrimingAggregate {
  return Object.freeze({
    intents: unionIntents(parts.intents ?? []),
    entities: unionEntities(parts.entities ?? []),
    vocabularyLists: mergeVocabularyLists(parts.vocabularyLists ?? []),
  });
}

export const EMPTY_AGGREGATE: PrimingAggregate = createAggregate();

export function isEmptyAggregate(aggregate: PrimingAggregate): boolean {
  return aggregate.intents.length === 0 && aggregate.entities.length === 0 && aggregate.vocabularyLists.size === 0;
}

/**
 * Pointwise union of aggregates, in argument order.
 */
export function mergeAggregates(...aggregates: readonly PrimingAggregate[]): PrimingAggregate {
  if (aggregates.length === 0) {
    return EMPTY_AGGREGATE;
  }
  return createAggregate({
    intents: aggregates.flatMap((a) => a.intents),
    entities: aggregates.flatMap((a) => a.entities),
    vocabularyLists: aggregates.flatMap((a) => [...a.vocabularyLists.values()]),
  });
}
