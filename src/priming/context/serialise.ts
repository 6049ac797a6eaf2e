/**
 * Wire serialisation for the voice channel
 *
 * snake_case like the rest of the HTTP API. Key order is fixed so two
 * equal aggregates serialise to identical JSON.
 */

import type { InputContext, PrimingAggregate } from "../types.js";
import type { ContextFrame } from "./stack.js";

export interface WireIntent {
  name: string;
  source: string;
}

export interface WireEntity {
  name: string;
  id?: string;
  source?: string;
}

export interface WireDynamicList {
  entity: string;
  list: Array<{ canonical_form: string; synonyms: string[] }>;
}

export interface WireAggregate {
  intents: WireIntent[];
  entities: WireEntity[];
  dynamic_lists: WireDynamicList[];
}

export interface WireInputContext {
  locale: string;
  possible: WireAggregate;
  expected: WireAggregate;
}

export interface WireFrame extends WireInputContext {
  dialog_id: string;
}

export function serialiseAggregate(aggregate: PrimingAggregate): WireAggregate {
  return {
    intents: aggregate.intents.map((i) => ({ name: i.name, source: i.source })),
    entities: aggregate.entities.map((e) => {
      const wire: WireEntity = { name: e.name };
      if (e.id !== undefined) wire.id = e.id;
      if (e.source !== undefined) wire.source = e.source;
      return wire;
    }),
    dynamic_lists: [...aggregate.vocabularyLists.values()].map((list) => ({
      entity: list.entity,
      list: list.entries.map((entry) => ({
        canonical_form: entry.canonicalForm,
        synonyms: [...entry.synonyms],
      })),
    })),
  };
}

export function serialiseInputContext(context: InputContext): WireInputContext {
  return {
    locale: context.locale,
    possible: serialiseAggregate(context.possible),
    expected: serialiseAggregate(context.expected),
  };
}

export function serialiseFrame(frame: ContextFrame): WireFrame {
  return {
    dialog_id: frame.dialogId,
    ...serialiseInputContext(frame),
  };
}
