/**
 * Declarative definitions (Zod schemas)
 *
 * Validates JSON recognizer and dialog trees (as posted to the priming
 * routes or loaded from configuration) into the typed unions the providers
 * consume. Unknown `kind` values fail validation here; values built in
 * code that bypass validation fail in the providers instead.
 */

import { z } from "zod";
import type { Dialog, DialogSchema } from "../dialogs/types.js";
import { PREBUILT_ENTITY_TYPES, type Recognizer } from "../recognizers/types.js";

const Name = z.string().min(1).max(200);

// ============================================================================
// Recognizers
// ============================================================================

export const IntentSchema = z.object({
  name: Name,
  source: z.string().max(200),
});

export const EntitySchema = z.object({
  name: Name,
  id: z.string().max(200).optional(),
  source: z.string().max(200).optional(),
});

const DynamicListSchema = z.object({
  entity: Name,
  list: z.array(
    z.object({
      canonicalForm: z.string().min(1),
      synonyms: z.array(z.string()).optional(),
    }),
  ),
});

export const RecognizerSchema: z.ZodType<Recognizer> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("prebuilt_entity"),
      id: z.string().optional(),
      entity: z.enum(PREBUILT_ENTITY_TYPES),
    }),
    z.object({
      kind: z.literal("regex_entity"),
      id: z.string().optional(),
      name: Name,
      patterns: z.array(z.string()).optional(),
    }),
    z.object({
      kind: z.literal("nlu_model"),
      id: z.string().optional(),
      applicationId: z.string().optional(),
      possibleIntents: z.array(IntentSchema).optional(),
      possibleEntities: z.array(EntitySchema).optional(),
      dynamicLists: z.array(DynamicListSchema).optional(),
    }),
    z.object({
      kind: z.literal("faq"),
      id: z.string().optional(),
      knowledgeBaseId: z.string().optional(),
    }),
    z.object({
      kind: z.literal("recognizer_set"),
      id: z.string().optional(),
      recognizers: z.array(RecognizerSchema),
    }),
    z.object({
      kind: z.literal("cross_trained_set"),
      id: z.string().optional(),
      recognizers: z.array(RecognizerSchema),
    }),
    z.object({
      kind: z.literal("multi_language"),
      id: z.string().optional(),
      recognizers: z.record(RecognizerSchema),
    }),
  ]),
);

// ============================================================================
// Dialogs
// ============================================================================

export const PropertySchemaDefinition: z.ZodType<DialogSchema> = z.object({
  type: z.literal("object"),
  properties: z.record(
    z.object({
      type: z.string().optional(),
      $entities: z.array(Name).optional(),
    }),
  ),
});

const DialogId = z.string().min(1).max(200);

const inputFields = {
  id: DialogId,
  prompt: z.string().optional(),
  property: z.string().optional(),
};

const ChoiceSchema = z.object({
  value: z.string().min(1),
  action: z
    .object({
      title: z.string().optional(),
      type: z.string().optional(),
      value: z.string().optional(),
    })
    .optional(),
  synonyms: z.array(z.string()).optional(),
});

const TriggerSchema = z.object({
  event: z.enum(["begin_dialog", "intent", "unknown_intent", "end_of_actions", "event"]),
  intent: z.string().optional(),
  condition: z.string().optional(),
  actions: z.array(z.lazy(() => DialogDefinitionSchema)),
});

export const DialogDefinitionSchema: z.ZodType<Dialog> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("number_input"), ...inputFields }),
    z.object({ kind: z.literal("confirm_input"), ...inputFields }),
    z.object({ kind: z.literal("text_input"), ...inputFields }),
    z.object({ kind: z.literal("attachment_input"), ...inputFields }),
    z.object({ kind: z.literal("date_time_input"), ...inputFields }),
    z.object({
      kind: z.literal("choice_input"),
      ...inputFields,
      choices: z.array(ChoiceSchema),
      recognizerOptions: z
        .object({
          noValue: z.boolean().optional(),
          noAction: z.boolean().optional(),
          recognizeNumbers: z.boolean().optional(),
          recognizeOrdinals: z.boolean().optional(),
        })
        .optional(),
    }),
    z.object({
      kind: z.literal("adaptive"),
      id: DialogId,
      recognizer: RecognizerSchema.optional(),
      triggers: z.array(TriggerSchema),
      schema: PropertySchemaDefinition.optional(),
    }),
    z.object({ kind: z.literal("send_activity"), id: DialogId, activity: z.string() }),
    z.object({
      kind: z.literal("ask"),
      id: DialogId,
      activity: z.string(),
      expectedProperties: z.array(z.string().min(1)),
    }),
    z.object({ kind: z.literal("end_dialog"), id: DialogId, value: z.string().optional() }),
    z.object({ kind: z.literal("set_property"), id: DialogId, property: z.string(), value: z.string() }),
    z.object({
      kind: z.literal("if_condition"),
      id: DialogId,
      condition: z.string(),
      actions: z.array(DialogDefinitionSchema),
      elseActions: z.array(DialogDefinitionSchema).optional(),
    }),
    z.object({
      kind: z.literal("switch_condition"),
      id: DialogId,
      condition: z.string(),
      cases: z.array(z.object({ value: z.string(), actions: z.array(DialogDefinitionSchema) })),
      default: z.array(DialogDefinitionSchema).optional(),
    }),
    z.object({
      kind: z.literal("foreach"),
      id: DialogId,
      itemsProperty: z.string(),
      actions: z.array(DialogDefinitionSchema),
    }),
    z.object({ kind: z.literal("begin_dialog"), id: DialogId, dialog: DialogId }),
  ]),
);

export function parseRecognizer(input: unknown): Recognizer {
  return RecognizerSchema.parse(input);
}

export function parseDialog(input: unknown): Dialog {
  return DialogDefinitionSchema.parse(input);
}
