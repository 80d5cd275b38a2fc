/**
 * Tests for the SQLite backend, run bookkeeping and the postgres placeholder
 * rewrite.
 */
import { describe, test, expect } from "vitest";

import { PipelineRunError } from "../src/core/exceptions.js";
import { completePipelineRun, createPipelineRun, logValidationErrors } from "../src/core/runs.js";
import { withDatabase, type DatabaseBackend, type DbRow } from "../src/db/backend.js";
import { toPostgresPlaceholders } from "../src/db/postgres.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { logger, makeDb, weatherRecord } from "./fixtures.js";

describe("SQLiteBackend", () => {
  test("initialize creates every table", async () => {
    const db = await makeDb();
    const rows = await db.query(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    );
    expect(rows.map((r) => r.name)).toEqual([
      "error_log",
      "pipeline_runs",
      "stg_csv_data",
      "stg_weather_data",
      "weather_metrics",
    ]);
    await db.close();
  });

  test("initialize is repeatable", async () => {
    const db = await makeDb();
    await db.initialize();
    expect(await db.queryOne("SELECT COUNT(*) AS n FROM pipeline_runs")).toEqual({ n: 0 });
    await db.close();
  });

  test("execute returns affected rows", async () => {
    const db = await makeDb();
    await createPipelineRun(db, "p", "weather_api");
    await createPipelineRun(db, "p", "csv_file");
    const changed = await db.execute("UPDATE pipeline_runs SET status = ? WHERE pipeline_name = ?", [
      "failed",
      "p",
    ]);
    expect(changed).toBe(2);
    await db.close();
  });

  test("queryOne returns null when nothing matches", async () => {
    const db = await makeDb();
    expect(await db.queryOne("SELECT * FROM pipeline_runs WHERE run_id = ?", [99])).toBeNull();
    await db.close();
  });

  test("weather_metrics rejects humidity above 100", async () => {
    const db = await makeDb();
    await expect(
      db.execute(
        `INSERT INTO weather_metrics (city, country, temperature, humidity, recorded_at, loaded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        ["ASUNCION", "Paraguay", 30, 150, "2024-12-01T15:00:00.000Z", "2024-12-01T15:05:00.000Z"],
      ),
    ).rejects.toThrow(/CHECK constraint failed/);
    await db.close();
  });
});

describe("pipeline run bookkeeping", () => {
  test("createPipelineRun inserts a running row", async () => {
    const db = await makeDb();
    const start = new Date("2024-12-01T15:00:00.000Z");
    const runId = await createPipelineRun(db, "multi_source_ingestion", "weather_api", start);
    expect(runId).toBe(1);
    const row = await db.queryOne("SELECT * FROM pipeline_runs WHERE run_id = ?", [runId]);
    expect(row?.status).toBe("running");
    expect(row?.pipeline_name).toBe("multi_source_ingestion");
    expect(row?.source_type).toBe("weather_api");
    expect(row?.start_time).toBe("2024-12-01T15:00:00.000Z");
    expect(row?.end_time).toBeNull();
    await db.close();
  });

  test("completePipelineRun writes counters, duration and metadata", async () => {
    const db = await makeDb();
    const start = new Date("2024-12-01T15:00:00.000Z");
    const end = new Date("2024-12-01T15:00:02.500Z");
    const runId = await createPipelineRun(db, "p", "weather_api", start);
    await completePipelineRun(
      db,
      runId,
      start,
      {
        status: "partial",
        recordsExtracted: 8,
        recordsValidated: 7,
        recordsLoaded: 7,
        recordsFailed: 1,
        metadata: { recordsTransformed: 7 },
      },
      end,
    );

    const row = await db.queryOne("SELECT * FROM pipeline_runs WHERE run_id = ?", [runId]);
    expect(row).toMatchObject({
      status: "partial",
      end_time: "2024-12-01T15:00:02.500Z",
      duration_seconds: 2.5,
      records_extracted: 8,
      records_validated: 7,
      records_loaded: 7,
      records_failed: 1,
      error_message: null,
      metadata: '{"recordsTransformed":7}',
    });
    await db.close();
  });

  test("completePipelineRun throws for an unknown run", async () => {
    const db = await makeDb();
    await expect(
      completePipelineRun(db, 42, new Date(), { status: "failed", errorMessage: "x" }),
    ).rejects.toBeInstanceOf(PipelineRunError);
    await db.close();
  });

  test("logValidationErrors writes one row per rejected record", async () => {
    const db = await makeDb();
    const runId = await createPipelineRun(db, "p", "weather_api");
    const record = weatherRecord({ city: "Pilar", temperature: 75, humidity: 120 });
    const errors = [
      "Temperature out of range: 75 (expected -50 to 60)",
      "Humidity out of range: 120% (expected 0 to 100)",
    ];

    const logged = await logValidationErrors(db, runId, "weather_api", [{ record, errors }], logger);
    expect(logged).toBe(1);

    const row = await db.queryOne("SELECT * FROM error_log WHERE run_id = ?", [runId]);
    expect(row?.source_type).toBe("weather_api");
    expect(row?.error_type).toBe("validation_error");
    expect(row?.error_message).toBe(errors.join("; "));
    expect(JSON.parse(String(row?.error_details))).toEqual(errors);
    expect(JSON.parse(String(row?.raw_data))).toMatchObject({ city: "Pilar", temperature: 75 });
    expect(row?.retry_count).toBe(0);
    expect(row?.resolved).toBe(0);
    await db.close();
  });

  test("logValidationErrors skips records it cannot serialise", async () => {
    const db = await makeDb();
    const runId = await createPipelineRun(db, "p", "weather_api");
    const loop: Record<string, unknown> = { name: "loop" };
    loop.self = loop;

    const logged = await logValidationErrors(
      db,
      runId,
      "weather_api",
      [
        { record: weatherRecord({ rawData: loop }), errors: ["bad"] },
        { record: weatherRecord(), errors: ["also bad"] },
      ],
      logger,
    );
    expect(logged).toBe(1);
    await db.close();
  });
});

describe("withDatabase", () => {
  class TrackingBackend implements DatabaseBackend {
    inner = new SQLiteBackend();
    closed = false;

    initialize(): Promise<void> {
      return this.inner.initialize();
    }
    execute(sql: string, params?: (string | number | null)[]): Promise<number> {
      return this.inner.execute(sql, params);
    }
    query(sql: string, params?: (string | number | null)[]): Promise<DbRow[]> {
      return this.inner.query(sql, params);
    }
    queryOne(sql: string, params?: (string | number | null)[]): Promise<DbRow | null> {
      return this.inner.queryOne(sql, params);
    }
    async close(): Promise<void> {
      this.closed = true;
      await this.inner.close();
    }
  }

  test("closes the backend after success", async () => {
    const backend = new TrackingBackend();
    const count = await withDatabase(
      () => backend,
      async (db) => (await db.query("SELECT * FROM pipeline_runs")).length,
    );
    expect(count).toBe(0);
    expect(backend.closed).toBe(true);
  });

  test("closes the backend when the body throws", async () => {
    const backend = new TrackingBackend();
    await expect(
      withDatabase(
        () => backend,
        async () => {
          throw new Error("body failed");
        },
      ),
    ).rejects.toThrow("body failed");
    expect(backend.closed).toBe(true);
  });
});

describe("toPostgresPlaceholders", () => {
  test("numbers each placeholder in order", () => {
    expect(toPostgresPlaceholders("UPDATE t SET a = ?, b = ? WHERE id = ?")).toBe(
      "UPDATE t SET a = $1, b = $2 WHERE id = $3",
    );
  });

  test("leaves statements without placeholders untouched", () => {
    expect(toPostgresPlaceholders("SELECT 1")).toBe("SELECT 1");
  });
});
