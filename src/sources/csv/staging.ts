/**
 * CSV staging loader – one stg_csv_data row per record.
 */
import type { StagingLoader } from "../../core/etl.js";
import { errorMessage } from "../../core/exceptions.js";
import type { CsvRecord } from "../../core/types.js";
import type { DatabaseBackend } from "../../db/backend.js";
import type { Logger } from "../../logger.js";

export class CsvStagingLoader implements StagingLoader<CsvRecord> {
  private db: DatabaseBackend;
  private logger: Logger;

  constructor(db: DatabaseBackend, logger: Logger) {
    this.db = db;
    this.logger = logger.child({ component: "loader.csv_file" });
  }

  async load(records: CsvRecord[], runId: number): Promise<number> {
    let loaded = 0;

    for (const record of records) {
      try {
        await this.db.execute(
          `INSERT INTO stg_csv_data (source_file, row_number, raw_data, extracted_at, run_id)
           VALUES (?, ?, ?, ?, ?)`,
          [
            record.sourceFile,
            record.rowNumber,
            JSON.stringify(record.data),
            new Date().toISOString(),
            runId,
          ],
        );
        loaded++;
        this.logger.debug({ runId, row: record.rowNumber }, "Staged CSV row");
      } catch (err) {
        this.logger.error(
          { runId, file: record.sourceFile, row: record.rowNumber, error: errorMessage(err) },
          "Failed to stage CSV record",
        );
      }
    }

    this.logger.info({ runId }, `Loaded ${loaded}/${records.length} CSV records`);
    return loaded;
  }
}
