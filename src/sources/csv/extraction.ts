/**
 * CSV extraction – every `*.csv` under a storage prefix becomes a batch of
 * CsvRecords, one per data row.
 */
import { posix } from "node:path";
import { read, utils } from "xlsx";

import type { ExtractionStrategy } from "../../core/etl.js";
import { errorMessage } from "../../core/exceptions.js";
import type { CsvRecord } from "../../core/types.js";
import type { Logger } from "../../logger.js";
import type { StorageBackend } from "../../storage/backend.js";

/** Decode as UTF-8, falling back to latin-1 for legacy exports. */
export function decodeCsv(bytes: Uint8Array): { text: string; encoding: "utf-8" | "latin1" } {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(bytes), encoding: "utf-8" };
  } catch {
    return { text: Buffer.from(bytes).toString("latin1"), encoding: "latin1" };
  }
}

/**
 * Parse CSV text into header-keyed rows. Cells stay as text (`raw`) so the
 * validator sees exactly what the file holds; empty cells become null.
 */
export function parseCsv(text: string): Record<string, unknown>[] {
  const workbook = read(text, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return [];
  return utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null, raw: true });
}

export class CsvExtractionStrategy implements ExtractionStrategy<CsvRecord> {
  private storage: StorageBackend;
  private prefix: string;
  private logger: Logger;

  constructor(opts: { storage: StorageBackend; prefix?: string; logger: Logger }) {
    this.storage = opts.storage;
    this.prefix = opts.prefix ?? "";
    this.logger = opts.logger.child({ component: "extractor.csv_file" });
  }

  async findCsvFiles(): Promise<string[]> {
    if (!(await this.storage.exists(this.prefix))) {
      this.logger.warn({ prefix: this.prefix }, "Data folder not found");
      return [];
    }
    const keys = await this.storage.list(this.prefix);
    const csvFiles = keys.filter((k) => k.toLowerCase().endsWith(".csv"));
    this.logger.info({ prefix: this.prefix }, `Found ${csvFiles.length} CSV files`);
    return csvFiles;
  }

  async readCsvFile(key: string): Promise<CsvRecord[]> {
    const { text, encoding } = decodeCsv(await this.storage.read(key));
    if (encoding === "latin1") {
      this.logger.warn({ file: key }, "UTF-8 decode failed, read as latin-1");
    }
    const sourceFile = posix.basename(key);
    return parseCsv(text).map((data, idx) => ({
      sourceFile,
      rowNumber: idx + 2,
      data,
    }));
  }

  async extract(): Promise<CsvRecord[]> {
    const files = await this.findCsvFiles();
    if (files.length === 0) {
      this.logger.warn("No CSV files to process");
      return [];
    }

    const records: CsvRecord[] = [];
    for (const key of files) {
      try {
        const fileRecords = await this.readCsvFile(key);
        records.push(...fileRecords);
        this.logger.info({ file: key }, `Extracted ${fileRecords.length} records`);
      } catch (err) {
        this.logger.error({ file: key, error: errorMessage(err) }, "Failed to process CSV file");
      }
    }
    return records;
  }
}
