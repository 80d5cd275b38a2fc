/**
 * Record, validation and pipeline-run types shared across sources.
 */

export type RunStatus = "running" | "success" | "partial" | "failed";

/** One current-weather observation as produced by extraction. */
export interface WeatherRecord {
  city: string | null;
  country: string | null;
  temperature: number | null;
  feelsLike: number | null;
  humidity: number | null;
  pressure: number | null;
  weatherCondition: string | null;
  windSpeed: number | null;
  /** ISO time the provider last updated the observation. */
  observedAt: string | null;
  rawData: unknown;
}

/** One data row of a CSV file. `rowNumber` counts the header as line 1. */
export interface CsvRecord {
  sourceFile: string;
  rowNumber: number;
  data: Record<string, unknown>;
}

export interface ValidationOutcome {
  isValid: boolean;
  errors: string[];
}

export interface InvalidRecord<T> {
  record: T;
  errors: string[];
}

export interface BatchValidationResult<T> {
  totalRecords: number;
  validCount: number;
  invalidCount: number;
  validRecords: T[];
  invalidRecords: InvalidRecord<T>[];
}

export interface TransformStats {
  recordsTransformed: number;
  recordsLoaded: number;
}

/** Result returned from ETLPipeline.run(). */
export interface PipelineResult {
  runId: number;
  sourceType: string;
  status: Exclude<RunStatus, "running">;
  recordsExtracted: number;
  recordsValid: number;
  recordsInvalid: number;
  errorsLogged: number;
  recordsStaged: number;
  recordsTransformed: number;
  recordsPromoted: number;
}

/** Final counters written to pipeline_runs when a run ends. */
export interface RunCompletion {
  status: Exclude<RunStatus, "running">;
  recordsExtracted?: number;
  recordsValidated?: number;
  recordsLoaded?: number;
  recordsFailed?: number;
  errorMessage?: string | null;
  metadata?: Record<string, unknown> | null;
}
