import type { FastifyInstance } from "fastify";
import { config } from "../config/index.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

export default async function route(app: FastifyInstance) {
  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    priming: {
      default_locale: config.priming.defaultLocale,
      memoize_descriptions: config.priming.memoizeDescriptions,
      max_replay_events: config.priming.maxReplayEvents,
    },
  }));
}
