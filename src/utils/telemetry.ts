import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * Redaction paths are centralised in src/utils/logger-config.ts so the
 * Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type Event = Record<string, unknown>;

/**
 * Test sink for capturing telemetry events in tests.
 * Only allowed when NODE_ENV=test or VITEST is set.
 */
let testSink: ((eventName: string, data: Event) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: Event) => void) | null): void {
  // Direct env check: config may not be initialised yet when tests install a sink
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names.
 * Dashboards key off these strings; rename only together with them.
 */
export const TelemetryEvents = {
  // Description requests
  DescribeRequested: "priming.describe.requested",
  DescribeCompleted: "priming.describe.completed",
  DescribeFailed: "priming.describe.failed",

  // Context stack lifecycle
  StackMismatch: "priming.stack.mismatch",
  StackUnwound: "priming.stack.unwound",

  // Context replay route
  ContextReplayCompleted: "priming.context.replay_completed",
  ContextReplayFailed: "priming.context.replay_failed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "priming.",
    globalTags: {
      service: env.DD_SERVICE || "speech-priming-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

type TelemetryLeaf = string | number | boolean | null;

/**
 * Keep primitive fields and arrays of primitives; nested objects are dropped.
 */
function sanitizeTelemetryData(data: Event): Record<string, TelemetryLeaf | TelemetryLeaf[]> {
  const out: Record<string, TelemetryLeaf | TelemetryLeaf[]> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      out[key] = value;
    } else if (Array.isArray(value)) {
      out[key] = value.filter(
        (item): item is TelemetryLeaf =>
          item === null || typeof item === "string" || typeof item === "number" || typeof item === "boolean",
      );
    }
  }
  return out;
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.DescribeCompleted: {
        datadogClient.increment("describe.completed", 1, {
          target: String(eventData.target ?? "unknown"),
        });
        if (typeof eventData.entity_count === "number") {
          datadogClient.histogram("describe.entities", eventData.entity_count);
        }
        if (typeof eventData.intent_count === "number") {
          datadogClient.histogram("describe.intents", eventData.intent_count);
        }
        break;
      }

      case TelemetryEvents.DescribeFailed:
      case TelemetryEvents.ContextReplayFailed: {
        datadogClient.increment("errors", 1, {
          event,
          code: String(eventData.code ?? "unknown"),
        });
        break;
      }

      case TelemetryEvents.StackMismatch: {
        datadogClient.increment("stack.mismatch", 1);
        break;
      }

      case TelemetryEvents.StackUnwound: {
        if (typeof eventData.frames === "number") {
          datadogClient.histogram("stack.unwound_frames", eventData.frames);
        }
        break;
      }

      case TelemetryEvents.ContextReplayCompleted: {
        if (typeof eventData.event_count === "number") {
          datadogClient.histogram("context.replay_events", eventData.event_count);
        }
        break;
      }

      default:
        break;
    }
  } catch (error) {
    log.warn({ error, event }, "Failed to forward telemetry to Datadog");
  }
}
