import type { ErrorKind, ErrorResponse } from "@readright/shared";

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends PipelineError {
  readonly kind = "ValidationError" as const;
  readonly status = 400;
}

export class NotFoundError extends PipelineError {
  readonly kind = "NotFoundError" as const;
  readonly status = 404;
}

export class PayloadTooLargeError extends PipelineError {
  readonly kind = "PayloadTooLargeError" as const;
  readonly status = 413;
}

export class ConfigurationError extends PipelineError {
  readonly kind = "ConfigurationError" as const;
  readonly status = 500;
}

export class ExtractionError extends PipelineError {
  readonly kind = "ExtractionError" as const;
  readonly status = 502;
}

export class GenerationError extends PipelineError {
  readonly kind = "GenerationError" as const;
  readonly status = 502;
}

export class SynthesisError extends PipelineError {
  readonly kind = "SynthesisError" as const;
  readonly status = 502;
}

export class PersistenceError extends PipelineError {
  readonly kind = "PersistenceError" as const;
  readonly status = 502;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorResponse(error: unknown, requestId?: string): { status: number; body: ErrorResponse } {
  const kind: ErrorKind = error instanceof PipelineError ? error.kind : "InternalError";
  const status = error instanceof PipelineError ? error.status : 500;
  const body: ErrorResponse = { error: { kind, message: describeError(error) } };
  if (requestId) {
    body.requestId = requestId;
  }
  return { status, body };
}
