import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "RATE_LIMITED" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

function sanitizeMessage(message: string): string {
  return message
    // File paths
    .replace(/\/[\w/.@-]+/g, "[path]")
    // Inline secrets
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]")
    .replace(/\bsk-[A-Za-z0-9_-]{8,}/g, "[KEY_REDACTED]")
    // Email addresses
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

function numericProp(value: object, key: "statusCode" | "status"): number | undefined {
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === "number" ? prop : undefined;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  return numericProp(error, "statusCode") ?? numericProp(error, "status");
}

function retryAfterOf(error: unknown): Record<string, unknown> | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const details: unknown = Reflect.get(error, "details");
  if (typeof details !== "object" || details === null) return undefined;
  const seconds: unknown = Reflect.get(details, "retry_after_seconds");
  return typeof seconds === "number" ? { retry_after_seconds: seconds } : undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  const status = statusOf(error);

  // @fastify/rate-limit throws whatever errorResponseBuilder returns
  if (status === 429) {
    return buildErrorV1("RATE_LIMITED", "Too many requests", retryAfterOf(error), requestId);
  }

  if (error instanceof Error) {
    if (status === 413 || error.message.includes("Body limit exceeded")) {
      return buildErrorV1("BAD_INPUT", "Request body too large", undefined, requestId);
    }

    // Fastify's own 4xx errors (e.g. malformed JSON body)
    if (status !== undefined && status >= 400 && status < 500) {
      return buildErrorV1(
        status === 404 ? "NOT_FOUND" : "BAD_INPUT",
        sanitizeMessage(error.message || "Bad request"),
        undefined,
        requestId
      );
    }

    return buildErrorV1(
      "INTERNAL",
      sanitizeMessage(error.message || "An unexpected error occurred"),
      undefined,
      requestId
    );
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeMessage(error), undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "INTERNAL":
      return 500;
  }
}
