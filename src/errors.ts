/**
 * Error classes surfaced by the pipeline and the HTTP read paths.
 * Each carries the HTTP status the server answers with.
 */
export class PipelineError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = "internal_error",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** The URL does not name a recognizable video. No job is created. */
export class InvalidSourceError extends PipelineError {
  constructor(message: string) {
    super(message, 400, "invalid_source");
    this.name = "InvalidSourceError";
  }
}

export class AcquisitionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, "acquisition_failed", options);
    this.name = "AcquisitionError";
  }
}

/** Every model tier failed to load, or the engine failed mid-run. */
export class TranscriptionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, "transcription_failed", options);
    this.name = "TranscriptionError";
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super(message, 404, "not_found");
    this.name = "NotFoundError";
  }
}

export class RangeNotSatisfiableError extends PipelineError {
  readonly size: number;

  constructor(message: string, size: number) {
    super(message, 416, "range_not_satisfiable");
    this.name = "RangeNotSatisfiableError";
    this.size = size;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  const text = String(err ?? "");
  return text || "Processing failed";
}
