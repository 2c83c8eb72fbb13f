import { ContactValidationError } from "./sos.types";

export type SosFailureKind =
  | "cache_unavailable"
  | "search_failed"
  | "extraction_failed"
  | "validation_failed"
  | "deadline_exceeded"
  | "default_exhausted";

export abstract class SosPipelineError extends Error {
  abstract readonly kind: SosFailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CacheUnavailableError extends SosPipelineError {
  readonly kind = "cache_unavailable" as const;
}

export class SearchFailedError extends SosPipelineError {
  readonly kind = "search_failed" as const;
}

export class ExtractionFailedError extends SosPipelineError {
  readonly kind = "extraction_failed" as const;
}

export class ValidationFailedError extends SosPipelineError {
  readonly kind = "validation_failed" as const;

  constructor(readonly validationError: ContactValidationError) {
    super(`${validationError.reason}: ${validationError.detail}`);
  }
}

export class PipelineDeadlineError extends SosPipelineError {
  readonly kind = "deadline_exceeded" as const;
}

// The hardcoded fallback set is malformed. Never expected at runtime.
export class DefaultExhaustedError extends SosPipelineError {
  readonly kind = "default_exhausted" as const;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
