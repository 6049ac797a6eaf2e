/**
 * POST /v1/priming/describe
 *
 * Returns the priming description of a single recognizer or dialog tree.
 * `dialogs` supplies the dialog set that begin_dialog references resolve
 * against; the described dialog is always part of it.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config/index.js";
import {
  DialogDefinitionSchema,
  DialogSet,
  RecognizerSchema,
  createDialogContext,
  describeDialog,
  describeRecognizer,
  isPrimingError,
  serialiseAggregate,
  type PrimingAggregate,
} from "../priming/index.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

const LocaleSchema = z.string().min(1).max(35).optional();

// Strict objects: a body carrying both recognizer and dialog matches neither
const DescribeRequestSchema = z.union([
  z.object({ recognizer: RecognizerSchema, locale: LocaleSchema }).strict(),
  z
    .object({
      dialog: DialogDefinitionSchema,
      dialogs: z.array(DialogDefinitionSchema).optional(),
      locale: LocaleSchema,
    })
    .strict(),
]);

function describeBody(body: z.infer<typeof DescribeRequestSchema>): PrimingAggregate {
  if ("recognizer" in body) {
    return describeRecognizer(body.recognizer, body.locale);
  }
  const dialogSet = new DialogSet([body.dialog, ...(body.dialogs ?? [])]);
  const dialogContext = createDialogContext(dialogSet, body.locale ?? config.priming.defaultLocale);
  return describeDialog(body.dialog, dialogContext, dialogContext.locale);
}

export default async function route(app: FastifyInstance) {
  app.post("/v1/priming/describe", async (req, reply) => {
    const requestId = getRequestId(req);

    const parsed = DescribeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn({ request_id: requestId, errors: parsed.error.flatten() }, "Priming describe validation failed");
      emit(TelemetryEvents.DescribeFailed, { request_id: requestId, code: "BAD_INPUT" });
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const locale = parsed.data.locale;
    const target = "recognizer" in parsed.data ? "recognizer" : "dialog";
    emit(TelemetryEvents.DescribeRequested, { request_id: requestId, target, locale: locale ?? null });

    let description: PrimingAggregate;
    try {
      description = describeBody(parsed.data);
    } catch (error) {
      if (isPrimingError(error)) {
        emit(TelemetryEvents.DescribeFailed, { request_id: requestId, target, code: error.code });
      }
      throw error;
    }

    emit(TelemetryEvents.DescribeCompleted, {
      request_id: requestId,
      target,
      intent_count: description.intents.length,
      entity_count: description.entities.length,
      list_count: description.vocabularyLists.size,
    });

    return reply.send({
      target,
      locale: locale ?? null,
      description: serialiseAggregate(description),
    });
  });
}
