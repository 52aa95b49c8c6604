import "dotenv/config";

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { analysisRoutes } from "./routes/v1.analysis.js";
import { proposalRoutes } from "./routes/v1.proposals.js";
import { askRoutes } from "./routes/v1.ask.js";
import { createAlignmentService } from "./alignment/service.js";
import type { AlignmentService } from "./alignment/service.js";
import { getAdapter } from "./adapters/llm/router.js";
import { SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { config } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";

export const SERVICE_NAME = "plan-alignment-service";

const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];

export interface BuildOptions {
  /** Pre-wired service; defaults to one built from configuration */
  service?: AlignmentService;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  // Fail-fast: an OpenAI-backed deployment without a key would fail every run
  const needsOpenAI = config.llm.provider === "openai" || config.embeddings.provider === "openai";
  if (needsOpenAI && !config.llm.openaiApiKey) {
    throw new Error("FATAL: OpenAI provider configured but OPENAI_API_KEY is not set");
  }

  const service = options.service ?? createAlignmentService();

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    genReqId: (req) => getOrGenerateRequestId(req),
  });

  await app.register(cors, {
    origin: config.server.allowedOrigins ?? DEFAULT_ALLOWED_ORIGINS,
  });

  // Pure JSON API: CSP and embedder policies are not relevant
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

  await app.register(rateLimit, {
    global: true,
    max: config.server.rateLimitRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn({ event: "rate_limit_hit", max: context.max, request_id: req.id }, "Rate limit exceeded");

      // @fastify/rate-limit reads statusCode off the built body
      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, req.id),
      };
    },
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request.id);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: request.id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      app.log.warn(
        { request_id: request.id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, request.id));
  });

  app.get("/healthz", async () => {
    const adapter = getAdapter();
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider: adapter.name,
      model: adapter.model,
      embeddings: config.embeddings.provider,
      insights: config.alignment.insights,
    };
  });

  await analysisRoutes(app, service);
  await proposalRoutes(app, service);
  await askRoutes(app, service);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      const adapter = getAdapter();
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          provider: adapter.name,
          model: adapter.model,
          embeddings: config.embeddings.provider,
          data_dir: config.storage.dataDir,
          global_rate_limit_rpm: config.server.rateLimitRpm,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        },
        "Plan alignment service starting"
      );

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
