import { randomUUID } from "node:crypto";
import OpenAI from "openai";
import { Agent, setGlobalDispatcher } from "undici";
import { HTTP_CLIENT_TIMEOUT_MS } from "../../config/timeouts.js";
import { log } from "../../utils/telemetry.js";
import type { CallOpts, CritiqueAdapter, CritiqueCompletionArgs, CritiqueCompletionResult } from "./types.js";
import { UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";

const PROVIDER = "openai";
const OPERATION = "critique_decision";

// Undici dispatcher with transport timeouts for the SDK's fetch calls
// - connectTimeout: 3s (fail fast on connection issues)
// - headers/body timeout: HTTP_CLIENT_TIMEOUT_MS
const undiciAgent = new Agent({
  connect: {
    timeout: 3000,
  },
  headersTimeout: HTTP_CLIENT_TIMEOUT_MS,
  bodyTimeout: HTTP_CLIENT_TIMEOUT_MS,
});

setGlobalDispatcher(undiciAgent);

export interface OpenAIAdapterOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

function statusOf(error: Error): number | undefined {
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function stringProp(error: Error, key: "code" | "type" | "request_id"): string | undefined {
  const value: unknown = key in error ? Reflect.get(error, key) : undefined;
  return typeof value === "string" ? value : undefined;
}

/**
 * OpenAI adapter for the critique model.
 *
 * Exactly one attempt per call: SDK retries are disabled so that a failure
 * reaches the caller's fallback path immediately.
 */
export class OpenAIAdapter implements CritiqueAdapter {
  readonly name = PROVIDER;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIAdapterOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0,
    });
  }

  async complete(args: CritiqueCompletionArgs, opts: CallOpts): Promise<CritiqueCompletionResult> {
    const idempotencyKey = randomUUID();
    const timeoutMs = HTTP_CLIENT_TIMEOUT_MS;
    const startTime = Date.now();

    if (opts.signal?.aborted) {
      throw new UpstreamTimeoutError(
        `OpenAI ${OPERATION} aborted before LLM call started`,
        PROVIDER,
        OPERATION,
        "pre_aborted",
        0
      );
    }

    log.info(
      {
        request_id: opts.requestId,
        prompt_chars: args.prompt.length,
        temperature: args.temperature,
        model: this.model,
        provider: PROVIDER,
        idempotency_key: idempotencyKey,
      },
      "calling OpenAI for critique"
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);
    const onExternalAbort = (): void => abortController.abort();
    opts.signal?.addEventListener("abort", onExternalAbort, { once: true });

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: args.prompt }],
          temperature: args.temperature,
          response_format: { type: "json_object" },
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        log.error({ request_id: opts.requestId }, "OpenAI returned empty content");
        throw new Error("openai_empty_response");
      }

      return {
        content,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (error instanceof Error) {
        if (error.name === "AbortError" || abortController.signal.aborted) {
          const external = opts.signal?.aborted === true;
          log.error(
            { request_id: opts.requestId, timeout_ms: timeoutMs, elapsed_ms: elapsedMs, external },
            "OpenAI critique call aborted"
          );
          throw new UpstreamTimeoutError(
            external ? `OpenAI ${OPERATION} cancelled by caller` : `OpenAI ${OPERATION} timed out`,
            PROVIDER,
            OPERATION,
            "body",
            elapsedMs,
            error
          );
        }

        const status = statusOf(error);
        if (status !== undefined) {
          const requestId = stringProp(error, "request_id");
          log.error(
            { request_id: opts.requestId, status, upstream_request_id: requestId, elapsed_ms: elapsedMs },
            "OpenAI API returned non-2xx status"
          );
          throw new UpstreamHTTPError(
            `OpenAI ${OPERATION} failed: ${error.message || "unknown error"}`,
            PROVIDER,
            status,
            stringProp(error, "code") ?? stringProp(error, "type"),
            requestId,
            elapsedMs,
            error
          );
        }
      }

      log.error({ request_id: opts.requestId, error }, "OpenAI critique call failed");
      throw error;
    } finally {
      clearTimeout(timeoutId);
      opts.signal?.removeEventListener("abort", onExternalAbort);
    }
  }
}
