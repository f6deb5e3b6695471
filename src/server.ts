// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import critiqueDecisionRoute from "./routes/assist.v1.critique-decision.js";
import { createCritic, type Critic } from "./critique/orchestrator.js";
import { normalizeIntensity } from "./critique/intensity.js";
import { getCritiqueAdapter } from "./adapters/llm/router.js";
import type { CritiqueAdapter } from "./adapters/llm/types.js";
import { getConfig, isProduction } from "./config/index.js";
import { ROUTE_TIMEOUT_MS, HTTP_CLIENT_TIMEOUT_MS } from "./config/timeouts.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { emit, flushMetrics, TelemetryEvents } from "./utils/telemetry.js";
import { createLoggerConfig } from "./utils/logger-config.js";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function resolveAllowedOrigins(): string[] {
  const origins = getConfig().server.allowedOrigins ?? DEFAULT_ORIGINS;

  if (isProduction() && origins.some((origin) => origin === "*" || origin === '"*"')) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return origins;
}

export interface BuildOptions {
  /** Overrides the configured adapter; pass null to force heuristic-only */
  adapter?: CritiqueAdapter | null;
  critic?: Critic;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const cfg = getConfig();

  // Credential is read once here and injected; nothing below re-reads it
  const adapter = options.adapter !== undefined ? options.adapter : getCritiqueAdapter(cfg);
  const critic =
    options.critic ??
    createCritic({ adapter, defaultIntensity: normalizeIntensity(cfg.critique.defaultIntensity) });

  const app = Fastify({
    logger: createLoggerConfig(cfg.server.logLevel),
    bodyLimit: cfg.limits.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: (req) => getOrGenerateRequestId(req),
  });

  await app.register(cors, {
    origin: resolveAllowedOrigins(),
  });

  // Pure JSON API: CSP and cross-origin isolation headers do not apply
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  await app.register(rateLimit, {
    global: true,
    max: cfg.limits.globalRateLimitRpm,
    timeWindow: "1 minute",
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      const requestId = getRequestId(req);
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn(
        { event: "rate_limit_hit", max: context.max, request_id: requestId },
        "Rate limit exceeded"
      );
      // statusCode is read by @fastify/rate-limit
      return {
        statusCode: 429,
        ...buildErrorV1("RATE_LIMITED", "Too many requests", { retry_after_seconds: retryAfter }, requestId),
      };
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const body = toErrorV1(error, request);
    const status = getStatusCodeForErrorCode(body.code);

    if (status >= 500) {
      request.log.error({ err: error, request_id: body.request_id }, `[${body.code}] ${body.message}`);
      emit(TelemetryEvents.CritiqueFailed, {
        request_id: body.request_id,
        error_code: body.code,
        http_status: status,
      });
    } else {
      request.log.warn({ request_id: body.request_id, code: body.code }, `[${body.code}] ${body.message}`);
    }

    reply.code(status).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    reply
      .code(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, getRequestId(request)));
  });

  app.get("/healthz", async () => {
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      external_model: {
        available: critic.externalModelAvailable,
        provider: adapter?.name ?? null,
        model: adapter?.model ?? null,
      },
    };
  });

  await critiqueDecisionRoute(app, { critic });

  app.addHook("onClose", async () => {
    await flushMetrics();
  });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const cfg = getConfig();

  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          external_model_enabled: cfg.features.externalModel,
          model: cfg.llm.model,
          global_rate_limit_rpm: cfg.limits.globalRateLimitRpm,
          body_limit_mb: (cfg.limits.bodyLimitBytes / 1024 / 1024).toFixed(1),
          route_timeout_ms: ROUTE_TIMEOUT_MS,
          http_client_timeout_ms: HTTP_CLIENT_TIMEOUT_MS,
        },
        "Counterpoint service starting"
      );

      await app.listen({ port: cfg.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("❌ Failed to start server:", err);
      process.exit(1);
    });
}
