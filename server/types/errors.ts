/**
 * Error classes for the box-score ingest pipeline.
 *
 * Every error carries a stable code and a structured context so pino can log it
 * without string parsing. Only FatalSessionError is allowed to reach the entry point;
 * the others are caught within the date or event that raised them.
 */

import type { Logger } from "pino";

export const ERROR_CODES = {
  TRANSIENT_NAVIGATION: "TRANSIENT_NAVIGATION",
  FATAL_SESSION: "FATAL_SESSION",
  MALFORMED_RECORD: "MALFORMED_RECORD",
  INVALID_OPTIONS: "INVALID_OPTIONS",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export type ErrorContext = Record<string, unknown>;

// Base error class for the pipeline
export class PipelineError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;

  constructor(message: string, code: ErrorCode, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a page never reaches its readiness marker within the timeout,
 * after the navigator's own retries are used up
 */
export class TransientNavigationError extends PipelineError {
  constructor(url: string, attempts: number, cause?: unknown) {
    super(
      `Document at ${url} not ready after ${attempts} attempt(s)`,
      ERROR_CODES.TRANSIENT_NAVIGATION,
      { url, attempts },
      { cause }
    );
  }
}

/**
 * Thrown when no browser session could be started with a fresh profile
 */
export class FatalSessionError extends PipelineError {
  constructor(attempts: number, cause?: unknown) {
    super(
      `Navigator session failed to start after ${attempts} attempt(s)`,
      ERROR_CODES.FATAL_SESSION,
      { attempts },
      { cause }
    );
  }
}

/**
 * Describes why a row was rejected at merge time. Never thrown by the merger;
 * collected so the drop can be counted and logged.
 */
export class MalformedRecordError extends PipelineError {
  constructor(reason: string, context?: ErrorContext) {
    super(`Malformed record: ${reason}`, ERROR_CODES.MALFORMED_RECORD, context);
  }
}

export class InvalidOptionsError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ERROR_CODES.INVALID_OPTIONS, context);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Extract safe error information for logging
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  code: ErrorCode;
  context?: ErrorContext;
} {
  if (isPipelineError(error)) {
    return { message: error.message, code: error.code, context: error.context };
  }
  return { message: toError(error).message, code: ERROR_CODES.INTERNAL_ERROR };
}

export function logError(log: Logger, error: unknown, context?: ErrorContext): void {
  const errorInfo = extractErrorInfo(error);
  log.error({ error: errorInfo, context }, `Error occurred: ${errorInfo.message}`);
}
