import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Redaction paths are centralized in src/utils/logger-config.ts so the
 * Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only usable when NODE_ENV=test or VITEST is set.
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: config may not be parseable this early
  const isTestEnv = env.NODE_ENV === "test" || env.VITEST === "true" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  CritiqueRequested: "critique.requested",
  CritiqueSucceeded: "critique.succeeded",
  CritiqueFailed: "critique.failed",

  // External-model path
  ModelCallStarted: "critique.model_call.started",
  ModelCallSucceeded: "critique.model_call.succeeded",
  ModelCallFailed: "critique.model_call.failed",
  ModelFallback: "critique.model_fallback",
} as const;

export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "counterpoint.",
    globalTags: {
      service: env.DD_SERVICE || "counterpoint-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    const sanitizedObj: TelemetryShape = {};
    for (const [key, v] of Object.entries(value)) {
      const sanitizedChild = sanitizeTelemetryValue(v);
      if (sanitizedChild !== undefined) {
        sanitizedObj[key] = sanitizedChild;
      }
    }
    return sanitizedObj;
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tagOf(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 *
 * @param event Event name (use TelemetryEvents)
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) return;

  try {
    switch (event) {
      case TelemetryEvents.CritiqueSucceeded: {
        if (typeof eventData.latency_ms === "number") {
          datadogClient.histogram("critique.latency_ms", eventData.latency_ms, {
            source: tagOf(eventData.source, "unknown"),
            tier: tagOf(eventData.tier, "unknown"),
          });
        }
        if (typeof eventData.confidence === "number") {
          datadogClient.histogram("critique.confidence", eventData.confidence);
        }
        datadogClient.increment("critique.succeeded", 1, {
          source: tagOf(eventData.source, "unknown"),
        });
        break;
      }

      case TelemetryEvents.CritiqueFailed: {
        datadogClient.increment("critique.failed", 1, {
          error_code: tagOf(eventData.error_code, "unknown"),
        });
        break;
      }

      case TelemetryEvents.ModelCallSucceeded: {
        if (typeof eventData.elapsed_ms === "number") {
          datadogClient.histogram("critique.model_call.latency_ms", eventData.elapsed_ms, {
            model: tagOf(eventData.model, "unknown"),
          });
        }
        break;
      }

      case TelemetryEvents.ModelCallFailed:
      case TelemetryEvents.ModelFallback: {
        datadogClient.increment(event, 1, {
          reason: tagOf(eventData.reason, "unknown"),
        });
        break;
      }

      default:
        if (!VALID_EVENT_NAMES.has(event)) {
          log.warn({ event }, "Unknown telemetry event (not in frozen enum)");
        }
    }
  } catch (error) {
    // Telemetry must never break a request
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) return;
  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}
