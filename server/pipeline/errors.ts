import { isRetryableError } from "../../lib/reliability";

export type FailureKind = "transient" | "permanent";

export class TranscriptionError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TranscriptionError";
  }
}

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/**
 * Retry predicate for AI calls: typed adapter errors carry their own
 * classification, anything else falls back to status/message heuristics.
 */
export function isTransientAiError(error: unknown): boolean {
  if (error instanceof ExtractionError || error instanceof TranscriptionError) {
    return error.kind === "transient";
  }
  return isRetryableError(error);
}

export function retryAfterHint(error: unknown): number | null {
  return error instanceof ExtractionError ? error.retryAfterMs : null;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
