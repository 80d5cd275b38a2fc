/**
 * Custom exceptions for ETL pipeline operations.
 */

export class ExtractionFailedException extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message ? `Extraction failed: ${message}` : "Extraction failed", options);
    this.name = "ExtractionFailedException";
  }
}

export class StagingFailedException extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message ? `Staging failed: ${message}` : "Staging failed", options);
    this.name = "StagingFailedException";
  }
}

export class TransformFailedException extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message ? `Transform failed: ${message}` : "Transform failed", options);
    this.name = "TransformFailedException";
  }
}

/** Raised when the pipeline_runs bookkeeping itself cannot be written. */
export class PipelineRunError extends Error {
  runId: number | null;

  constructor(message: string, runId: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineRunError";
    this.runId = runId;
  }
}

export class UnsupportedSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedSourceError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
