/**
 * Shared test fixtures: weather records, API bodies, a stub fetch and
 * pre-initialised databases.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { createPipelineRun } from "../src/core/runs.js";
import type { WeatherRecord } from "../src/core/types.js";
import type { SqlParam } from "../src/db/backend.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { silentLogger } from "../src/logger.js";

export const logger = silentLogger();

// ---------------------------------------------------------------------------
// Weather records
// ---------------------------------------------------------------------------

export function weatherRecord(overrides: Partial<WeatherRecord> = {}): WeatherRecord {
  return {
    city: "Asuncion",
    country: "Paraguay",
    temperature: 31.4,
    feelsLike: 33.2,
    humidity: 48,
    pressure: 1009,
    weatherCondition: "partly cloudy",
    windSpeed: 12.6,
    observedAt: "2024-12-01T15:00:00.000Z",
    rawData: { source: "fixture" },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Weather API bodies and a stub fetch
// ---------------------------------------------------------------------------

export const LOCATIONS_TEXT = [
  "Asuncion = {latitud: -25.2637, longitud: -57.5759}",
  "Encarnacion = {latitud: -27.3306, longitud: -55.8667}",
  "Pilar = {latitud: -26.8667, longitud: -58.3}",
].join("\n");

export function apiBody(name: string, tempC: number, conditionText = "Partly Cloudy") {
  return {
    location: { name, country: "Paraguay", lat: -25.28, lon: -57.65, localtime_epoch: 1733065500 },
    current: {
      last_updated_epoch: 1733065200,
      temp_c: tempC,
      feelslike_c: 33.2,
      humidity: 48,
      pressure_mb: 1009,
      wind_kph: 12.6,
      condition: { text: conditionText },
    },
  };
}

export function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });
}

function toUrl(input: string | URL | Request): URL {
  if (input instanceof URL) return input;
  if (typeof input === "string") return new URL(input);
  return new URL(input.url);
}

/**
 * A fetch that answers by the `q` query parameter. Unknown coordinates get
 * a 404.
 */
export function stubFetch(byQuery: Record<string, () => Response>) {
  const calls: URL[] = [];
  const impl: typeof fetch = async (input) => {
    const url = toUrl(input);
    calls.push(url);
    const respond = byQuery[url.searchParams.get("q") ?? ""];
    return respond ? respond() : jsonResponse({ error: "not found" }, 404, "Not Found");
  };
  return { fetch: impl, calls };
}

// ---------------------------------------------------------------------------
// Database helpers
// ---------------------------------------------------------------------------

export async function makeDb(path = ":memory:"): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(path);
  await db.initialize();
  return db;
}

export async function makeRun(db: SQLiteBackend, sourceType = "weather_api"): Promise<number> {
  return createPipelineRun(db, "test_pipeline", sourceType);
}

export interface StagedWeatherInput {
  city: string | null;
  country: string | null;
  temperature: number | null;
  feels_like: number | null;
  humidity: number | null;
  pressure: number | null;
  weather_condition: string | null;
  wind_speed: number | null;
  observed_at: string | null;
  extracted_at: string;
}

/** Insert a stg_weather_data row directly, bypassing validation. */
export async function stageWeatherRow(
  db: SQLiteBackend,
  runId: number,
  overrides: Partial<StagedWeatherInput> = {},
): Promise<void> {
  const row: StagedWeatherInput = {
    city: "asuncion",
    country: "Paraguay",
    temperature: 31.44,
    feels_like: 33.25,
    humidity: 48,
    pressure: 1009,
    weather_condition: "Sunny",
    wind_speed: 12.64,
    observed_at: "2024-12-01T15:00:00.000Z",
    extracted_at: "2024-12-01T15:05:00.000Z",
    ...overrides,
  };
  const params: SqlParam[] = [
    row.city,
    row.country,
    row.temperature,
    row.feels_like,
    row.humidity,
    row.pressure,
    row.weather_condition,
    row.wind_speed,
    row.observed_at,
    "{}",
    row.extracted_at,
    runId,
  ];
  await db.execute(
    `INSERT INTO stg_weather_data (
       city, country, temperature, feels_like, humidity, pressure,
       weather_condition, wind_speed, observed_at, raw_data, extracted_at, run_id
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    params,
  );
}

export async function countRows(db: SQLiteBackend, table: string): Promise<number> {
  const row = await db.queryOne(`SELECT COUNT(*) AS n FROM ${table}`);
  return Number(row?.n ?? 0);
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "meteo-etl-test-"));
}

export function writeLocationsFile(dir: string, text = LOCATIONS_TEXT): string {
  const path = join(dir, "locations.txt");
  writeFileSync(path, text);
  return path;
}

export const SALES_CSV = [
  "date,product,category,amount,quantity,region",
  "2024-12-01,Laptop,Electronics,1200.50,2,Asuncion",
  "2024-12-02,Mouse,Accessories,25.99,5,Encarnacion",
  "2024-12-03,Desk,,310.00,1,Pilar",
].join("\n");
