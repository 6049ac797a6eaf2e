// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import healthRoute from "./routes/v1.health.js";
import describeRoute from "./routes/priming.v1.describe.js";
import contextRoute from "./routes/priming.v1.context.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { config, isProduction } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";

function resolveAllowedOrigins(): string[] {
  const origins = config.server.allowedOrigins;

  if (isProduction() && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build() {
  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    genReqId: getOrGenerateRequestId,
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // Pure JSON API: CSP and the cross-origin isolation headers do not apply
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      app.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", "Route not found", { method: request.method, url: request.url }, getRequestId(request)));
  });

  await healthRoute(app);
  await describeRoute(app);
  await contextRoute(app);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info({
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        node_env: config.server.nodeEnv,
        default_locale: config.priming.defaultLocale,
        memoize_descriptions: config.priming.memoizeDescriptions,
        max_replay_events: config.priming.maxReplayEvents,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        cors_origins: config.server.allowedOrigins,
      }, "Speech priming service starting");

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
