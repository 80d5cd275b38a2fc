/**
 * pipeline_runs and error_log bookkeeping.
 */
import { z } from "zod";
import type { DatabaseBackend } from "../db/backend.js";
import type { Logger } from "../logger.js";
import { errorMessage, PipelineRunError } from "./exceptions.js";
import type { InvalidRecord, RunCompletion } from "./types.js";

const RunIdRowSchema = z.object({ run_id: z.number().int() });

/** Insert a `running` run and return its id. */
export async function createPipelineRun(
  db: DatabaseBackend,
  pipelineName: string,
  sourceType: string,
  startTime: Date = new Date(),
): Promise<number> {
  const rows = await db.query(
    `INSERT INTO pipeline_runs (pipeline_name, source_type, status, start_time)
     VALUES (?, ?, ?, ?)
     RETURNING run_id`,
    [pipelineName, sourceType, "running", startTime.toISOString()],
  );
  const parsed = RunIdRowSchema.safeParse(rows[0]);
  if (!parsed.success) {
    throw new PipelineRunError("INSERT INTO pipeline_runs returned no run_id");
  }
  return parsed.data.run_id;
}

/** Move a run to its terminal status. */
export async function completePipelineRun(
  db: DatabaseBackend,
  runId: number,
  startTime: Date,
  completion: RunCompletion,
  endTime: Date = new Date(),
): Promise<void> {
  const durationSeconds = (endTime.getTime() - startTime.getTime()) / 1000;
  const updated = await db.execute(
    `UPDATE pipeline_runs
     SET status = ?,
         end_time = ?,
         duration_seconds = ?,
         records_extracted = ?,
         records_validated = ?,
         records_loaded = ?,
         records_failed = ?,
         error_message = ?,
         metadata = ?
     WHERE run_id = ?`,
    [
      completion.status,
      endTime.toISOString(),
      durationSeconds,
      completion.recordsExtracted ?? 0,
      completion.recordsValidated ?? 0,
      completion.recordsLoaded ?? 0,
      completion.recordsFailed ?? 0,
      completion.errorMessage ?? null,
      completion.metadata ? JSON.stringify(completion.metadata) : null,
      runId,
    ],
  );
  if (updated === 0) {
    throw new PipelineRunError(`Pipeline run ${runId} not found`, runId);
  }
}

/**
 * Append one `validation_error` row per rejected record. Failures are logged
 * per record; returns the number of rows written.
 */
export async function logValidationErrors<T>(
  db: DatabaseBackend,
  runId: number,
  sourceType: string,
  invalidRecords: InvalidRecord<T>[],
  logger: Logger,
): Promise<number> {
  let logged = 0;

  for (const { record, errors } of invalidRecords) {
    try {
      await db.execute(
        `INSERT INTO error_log (run_id, source_type, error_type, error_message, error_details, raw_data, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          runId,
          sourceType,
          "validation_error",
          errors.join("; "),
          JSON.stringify(errors),
          JSON.stringify(record),
          new Date().toISOString(),
        ],
      );
      logged++;
    } catch (err) {
      logger.error({ runId, error: errorMessage(err) }, "Failed to write error_log entry");
    }
  }

  return logged;
}
