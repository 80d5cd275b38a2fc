/**
 * Generic record validator. A source supplies its rule set; the batch
 * partition is shared by every source.
 */
import type { Logger } from "../logger.js";
import type {
  BatchValidationResult,
  InvalidRecord,
  ValidationOutcome,
} from "../core/types.js";

/** Partitions a batch into valid and invalid records. */
export interface RecordValidator<T> {
  validateRecord(record: T): ValidationOutcome;
  validateBatch(records: T[]): BatchValidationResult<T>;
}

/** Returns the error strings for one record; empty means valid. */
export type RecordRules<T> = (record: T) => string[];

export class BatchValidator<T> implements RecordValidator<T> {
  private rules: RecordRules<T>;
  private describe: (record: T) => string;
  private logger: Logger;

  constructor(opts: {
    name: string;
    rules: RecordRules<T>;
    logger: Logger;
    /** Short label for log lines, e.g. the city or the row number. */
    describe: (record: T) => string;
  }) {
    this.rules = opts.rules;
    this.describe = opts.describe;
    this.logger = opts.logger.child({ component: `validator.${opts.name}` });
  }

  validateRecord(record: T): ValidationOutcome {
    const errors = this.rules(record);
    return { isValid: errors.length === 0, errors };
  }

  validateBatch(records: T[]): BatchValidationResult<T> {
    const validRecords: T[] = [];
    const invalidRecords: InvalidRecord<T>[] = [];

    for (const record of records) {
      const { isValid, errors } = this.validateRecord(record);
      if (isValid) {
        validRecords.push(record);
        this.logger.debug({ record: this.describe(record) }, "Valid record");
      } else {
        invalidRecords.push({ record, errors });
        this.logger.warn(
          { record: this.describe(record), errors },
          "Invalid record",
        );
      }
    }

    const result: BatchValidationResult<T> = {
      totalRecords: records.length,
      validCount: validRecords.length,
      invalidCount: invalidRecords.length,
      validRecords,
      invalidRecords,
    };

    this.logger.info(
      { valid: result.validCount, total: result.totalRecords },
      `Validation complete: ${result.validCount}/${result.totalRecords} valid`,
    );

    return result;
  }
}
