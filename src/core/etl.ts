/**
 * ETL pipeline core – strategy interfaces and the ETLPipeline runner.
 */
import type { DatabaseBackend } from "../db/backend.js";
import type { Logger } from "../logger.js";
import type { RecordValidator } from "../validators/validator.js";
import {
  errorMessage,
  ExtractionFailedException,
  StagingFailedException,
  TransformFailedException,
} from "./exceptions.js";
import { completePipelineRun, createPipelineRun, logValidationErrors } from "./runs.js";
import type { BatchValidationResult, PipelineResult, TransformStats } from "./types.js";

// ---------------------------------------------------------------------------
// Strategy interfaces
// ---------------------------------------------------------------------------

/**
 * Produces a batch of raw records. Failures of individual source items are
 * handled inside; a rejection means the whole extraction failed.
 */
export interface ExtractionStrategy<T> {
  extract(): Promise<T[]>;
}

/** Persists a batch into a staging table tagged with `runId`. */
export interface StagingLoader<T> {
  load(records: T[], runId: number): Promise<number>;
}

/** Promotes the staged rows of one run into production. */
export interface Transformer {
  transformAndLoad(runId: number): Promise<TransformStats>;
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export interface ETLPipelineOptions<T> {
  pipelineName: string;
  sourceType: string;
  extraction: ExtractionStrategy<T>;
  validator: RecordValidator<T>;
  loader: StagingLoader<T>;
  transformer?: Transformer;
  db: DatabaseBackend;
  logger: Logger;
}

export class ETLPipeline<T> {
  private pipelineName: string;
  private sourceType: string;
  private extraction: ExtractionStrategy<T>;
  private validator: RecordValidator<T>;
  private loader: StagingLoader<T>;
  private transformer: Transformer | null;
  private db: DatabaseBackend;
  private logger: Logger;

  constructor(opts: ETLPipelineOptions<T>) {
    this.pipelineName = opts.pipelineName;
    this.sourceType = opts.sourceType;
    this.extraction = opts.extraction;
    this.validator = opts.validator;
    this.loader = opts.loader;
    this.transformer = opts.transformer ?? null;
    this.db = opts.db;
    this.logger = opts.logger.child({ component: "pipeline", sourceType: opts.sourceType });
  }

  /** Step 1: Extract raw records from the source. */
  async extract(): Promise<T[]> {
    try {
      return await this.extraction.extract();
    } catch (err) {
      throw new ExtractionFailedException(errorMessage(err), { cause: err });
    }
  }

  /** Step 2: Partition the batch into valid and invalid records. */
  validate(records: T[]): BatchValidationResult<T> {
    return this.validator.validateBatch(records);
  }

  /** Step 3: Stage the valid records for `runId`. */
  async stage(records: T[], runId: number): Promise<number> {
    try {
      return await this.loader.load(records, runId);
    } catch (err) {
      throw new StagingFailedException(errorMessage(err), { cause: err });
    }
  }

  /** Step 4: Promote the run's staged rows, when the source has a transformer. */
  async transform(runId: number): Promise<TransformStats> {
    if (!this.transformer) return { recordsTransformed: 0, recordsLoaded: 0 };
    try {
      return await this.transformer.transformAndLoad(runId);
    } catch (err) {
      throw new TransformFailedException(errorMessage(err), { cause: err });
    }
  }

  /** Run extract → validate → error log → stage → transform, recording the run. */
  async run(): Promise<PipelineResult> {
    const startTime = new Date();
    const runId = await createPipelineRun(
      this.db,
      this.pipelineName,
      this.sourceType,
      startTime,
    );
    const log = this.logger.child({ runId });
    log.info("Created pipeline run");

    let records: T[];
    try {
      records = await this.extract();
      log.info({ records: records.length }, `Extracted ${records.length} records`);
    } catch (err) {
      await this.markFailed(runId, startTime, err, log);
      throw err;
    }

    try {
      const validation = this.validate(records);
      log.info(
        { valid: validation.validCount, invalid: validation.invalidCount },
        "Validation complete",
      );

      let errorsLogged = 0;
      if (validation.invalidCount > 0) {
        errorsLogged = await logValidationErrors(
          this.db,
          runId,
          this.sourceType,
          validation.invalidRecords,
          log,
        );
        log.warn({ errorsLogged }, `Logged ${errorsLogged} invalid records to error_log`);
      }

      const staged = await this.stage(validation.validRecords, runId);
      log.info(
        { staged, valid: validation.validCount },
        `Loaded ${staged}/${validation.validCount} valid records to staging`,
      );

      const transformStats = await this.transform(runId);

      const status = validation.invalidCount === 0 ? "success" : "partial";
      await completePipelineRun(this.db, runId, startTime, {
        status,
        recordsExtracted: validation.totalRecords,
        recordsValidated: validation.validCount,
        recordsLoaded: staged,
        recordsFailed: validation.invalidCount,
        metadata: { ...transformStats, errorsLogged },
      });

      log.info(
        {
          status,
          extracted: validation.totalRecords,
          valid: validation.validCount,
          staged,
          failed: validation.invalidCount,
          promoted: transformStats.recordsLoaded,
        },
        `Pipeline completed with status: ${status}`,
      );

      return {
        runId,
        sourceType: this.sourceType,
        status,
        recordsExtracted: validation.totalRecords,
        recordsValid: validation.validCount,
        recordsInvalid: validation.invalidCount,
        errorsLogged,
        recordsStaged: staged,
        recordsTransformed: transformStats.recordsTransformed,
        recordsPromoted: transformStats.recordsLoaded,
      };
    } catch (err) {
      await this.markFailed(runId, startTime, err, log);
      throw err;
    }
  }

  /** Record a failed run; a failure to do so is logged, not thrown. */
  private async markFailed(
    runId: number,
    startTime: Date,
    err: unknown,
    log: Logger,
  ): Promise<void> {
    log.error({ error: errorMessage(err) }, "Pipeline failed");
    try {
      await completePipelineRun(this.db, runId, startTime, {
        status: "failed",
        errorMessage: errorMessage(err),
      });
    } catch (updateErr) {
      log.error({ error: errorMessage(updateErr) }, "Could not mark pipeline run as failed");
    }
  }
}
