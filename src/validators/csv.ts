/**
 * Rules for tabular business records (sales exports).
 */
import type { Logger } from "../logger.js";
import type { CsvRecord } from "../core/types.js";
import { BatchValidator } from "./validator.js";

export const CSV_REQUIRED_FIELDS = [
  "date",
  "product",
  "category",
  "amount",
  "quantity",
  "region",
] as const;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER = /^[+-]?\d+$/;

/** Plain decimal notation only; hex, binary, exponent and Infinity give NaN. */
function parseNumeric(value: unknown, pattern: RegExp): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : Number.NaN;
  if (typeof value !== "string") return Number.NaN;
  const text = value.trim();
  return pattern.test(text) ? Number(text) : Number.NaN;
}

export function csvRules(record: CsvRecord): string[] {
  const errors: string[] = [];
  const data = record.data;

  for (const field of CSV_REQUIRED_FIELDS) {
    const value = data[field];
    if (value == null || value === "") {
      errors.push(`Missing required field: ${field}`);
    }
  }

  if (errors.length > 0) return errors;

  const date = String(data.date);
  if (!isIsoDate(date)) {
    errors.push(`Invalid date format: ${date} (expected YYYY-MM-DD)`);
  }

  const amount = parseNumeric(data.amount, DECIMAL);
  if (Number.isNaN(amount)) {
    errors.push(`Amount must be a number: ${String(data.amount)}`);
  } else if (amount <= 0) {
    errors.push(`Amount must be positive: ${amount}`);
  }

  const quantity = parseNumeric(data.quantity, INTEGER);
  if (!Number.isInteger(quantity)) {
    errors.push(`Quantity must be an integer: ${String(data.quantity)}`);
  } else if (quantity <= 0) {
    errors.push(`Quantity must be positive: ${quantity}`);
  }

  if (!String(data.category).trim()) {
    errors.push("Category cannot be empty");
  }

  return errors;
}

export function createCsvValidator(logger: Logger): BatchValidator<CsvRecord> {
  return new BatchValidator<CsvRecord>({
    name: "csv",
    rules: csvRules,
    logger,
    describe: (r) => `${r.sourceFile}:${r.rowNumber}`,
  });
}
