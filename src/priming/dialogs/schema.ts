/**
 * Schema binding
 *
 * An adaptive dialog's schema maps property names to the entities that can
 * fill them. When the dialog asks for specific properties, the priming
 * context narrows to the entities bound to exactly those properties.
 */

import { SchemaBindingMissingError } from "../errors.js";
import { createAggregate } from "../merge.js";
import { entity, type Entity, type PrimingAggregate, type VocabularyList } from "../types.js";
import type { DialogSchema } from "./types.js";

/**
 * Entity names bound to the given properties, first-seen order, each once.
 * A property without `$entities` binds an entity named after itself.
 */
export function boundEntityNames(dialogId: string, schema: DialogSchema, properties: readonly string[]): string[] {
  const names = new Set<string>();
  for (const property of properties) {
    if (!Object.hasOwn(schema.properties, property)) {
      throw new SchemaBindingMissingError(dialogId, property);
    }
    const binding = schema.properties[property];
    for (const name of binding.$entities ?? [property]) {
      names.add(name);
    }
  }
  return [...names];
}

/**
 * Narrow `universe` to the entities the schema binds to `properties`.
 *
 * Each bound name keeps every entity of that name in the universe (all ids
 * and sources) together with its vocabulary list; a bound name the universe
 * lacks contributes a bare entity. Intents are dropped.
 */
export function narrowToProperties(
  dialogId: string,
  schema: DialogSchema,
  properties: readonly string[],
  universe: PrimingAggregate,
): PrimingAggregate {
  const entities: Entity[] = [];
  const vocabularyLists: VocabularyList[] = [];

  for (const name of boundEntityNames(dialogId, schema, properties)) {
    const matches = universe.entities.filter((candidate) => candidate.name === name);
    entities.push(...(matches.length > 0 ? matches : [entity(name)]));

    const list = universe.vocabularyLists.get(name);
    if (list) {
      vocabularyLists.push(list);
    }
  }

  return createAggregate({ entities, vocabularyLists });
}
