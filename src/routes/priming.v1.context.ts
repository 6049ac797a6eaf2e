/**
 * POST /v1/priming/context
 *
 * Replays a turn's dialog begin/expect/end/cancel events through a fresh
 * priming turn and returns what the voice channel would be primed with
 * after each event and at the end.
 *
 * The engine normally drives PrimingTurn in process; this route exposes the
 * same state machine to out-of-process channel adapters and for debugging
 * dialog trees.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config/index.js";
import {
  DialogDefinitionSchema,
  DialogSet,
  PrimingTurn,
  isPrimingError,
  serialiseFrame,
  serialiseInputContext,
  type WireInputContext,
} from "../priming/index.js";
import { primingErrorToErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

const DialogIdSchema = z.string().min(1).max(200);

const ReplayEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("begin"), dialog_id: DialogIdSchema, locale: z.string().min(1).max(35).optional() }),
  z.object({ type: z.literal("expect"), dialog_id: DialogIdSchema, properties: z.array(z.string().min(1)) }),
  z.object({ type: z.literal("end"), dialog_id: DialogIdSchema }),
  z.object({ type: z.literal("cancel") }),
]);

export type ReplayEvent = z.infer<typeof ReplayEventSchema>;

// Built per request: the event cap is configuration
function contextRequestSchema(maxEvents: number) {
  return z.object({
    locale: z.string().min(1).max(35).optional(),
    dialogs: z.array(DialogDefinitionSchema).min(1),
    events: z.array(ReplayEventSchema).max(maxEvents),
  });
}

interface EventSnapshot {
  index: number;
  type: ReplayEvent["type"];
  dialog_id: string | null;
  depth: number;
  input_context: WireInputContext;
}

async function applyEvent(turn: PrimingTurn, event: ReplayEvent): Promise<void> {
  switch (event.type) {
    case "begin":
      await turn.beginDialog(event.dialog_id, { locale: event.locale });
      return;
    case "expect":
      turn.declareExpectedProperties(event.dialog_id, event.properties);
      return;
    case "end":
      await turn.endDialog(event.dialog_id);
      return;
    case "cancel":
      turn.cancelAllDialogs();
      return;
  }
}

export default async function route(app: FastifyInstance) {
  app.post("/v1/priming/context", async (req, reply) => {
    const requestId = getRequestId(req);
    const startTime = Date.now();

    const parsed = contextRequestSchema(config.priming.maxReplayEvents).safeParse(req.body);
    if (!parsed.success) {
      log.warn({ request_id: requestId, errors: parsed.error.flatten() }, "Priming context validation failed");
      emit(TelemetryEvents.ContextReplayFailed, { request_id: requestId, code: "BAD_INPUT" });
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const { locale, dialogs, events } = parsed.data;
    const turn = new PrimingTurn({ dialogs: new DialogSet(dialogs), locale });
    const snapshots: EventSnapshot[] = [];

    try {
      for (const [index, event] of events.entries()) {
        try {
          await applyEvent(turn, event);
        } catch (error) {
          if (!isPrimingError(error)) {
            throw error;
          }
          emit(TelemetryEvents.ContextReplayFailed, {
            request_id: requestId,
            code: error.code,
            event_index: index,
          });
          const body = primingErrorToErrorV1(error, requestId);
          body.details = { ...body.details, event_index: index };
          return reply.code(error.code === "STACK_MISMATCH" ? 409 : 400).send(body);
        }

        snapshots.push({
          index,
          type: event.type,
          dialog_id: event.type === "cancel" ? null : event.dialog_id,
          depth: turn.stack.depth,
          input_context: serialiseInputContext(turn.getInputContext()),
        });
      }

      const result = {
        depth: turn.stack.depth,
        input_context: serialiseInputContext(turn.getInputContext()),
        frames: turn.stack.snapshot().map(serialiseFrame),
        events: snapshots,
      };

      emit(TelemetryEvents.ContextReplayCompleted, {
        request_id: requestId,
        event_count: events.length,
        final_depth: result.depth,
        elapsed_ms: Date.now() - startTime,
      });

      return reply.send(result);
    } finally {
      // A replay may legitimately stop mid-dialog
      turn.end({ openFramesExpected: true });
    }
  });
}
