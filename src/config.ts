/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DEFAULT_TIMEOUT_MS, DEFAULT_WEATHER_API_URL } from "./sources/weather/extraction.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const DbConfigSchema = z.object({
  provider: z.enum(["sqlite", "postgres"]).default("sqlite"),
  path: z.string().default("./meteo-etl.db"),
  connectionString: z.string().optional(),
});

const WeatherConfigSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().default(DEFAULT_WEATHER_API_URL),
  locationsFile: z.string().default("./data/locations.txt"),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

const CsvConfigSchema = z.object({
  path: z.string().default("./data/raw"),
});

export const ConfigSchema = z.object({
  db: DbConfigSchema.default({}),
  weather: WeatherConfigSchema.default({}),
  csv: CsvConfigSchema.default({}),
  pipelineName: z.string().min(1).default("multi_source_ingestion"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export function parseConfig(raw: ConfigInput = {}): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Environment → config
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

function postgresUrlFromParts(env: Env): string | undefined {
  if (!env.POSTGRES_HOST && !env.POSTGRES_DB) return undefined;
  const user = encodeURIComponent(env.POSTGRES_USER ?? "postgres");
  const password = env.POSTGRES_PASSWORD ? `:${encodeURIComponent(env.POSTGRES_PASSWORD)}` : "";
  const host = env.POSTGRES_HOST ?? "localhost";
  const port = env.POSTGRES_PORT ?? "5432";
  const database = env.POSTGRES_DB ?? "data_ingestion";
  return `postgres://${user}${password}@${host}:${port}/${database}`;
}

/** Build the raw config input from environment variables; unset keys fall back to defaults. */
export function configFromEnv(env: Env = process.env): ConfigInput {
  const db: NonNullable<ConfigInput["db"]> = {};
  if (env.DB_PROVIDER === "sqlite" || env.DB_PROVIDER === "postgres") {
    db.provider = env.DB_PROVIDER;
  } else if (env.DB_PROVIDER) {
    throw new ConfigurationError(`Unknown DB_PROVIDER: ${env.DB_PROVIDER}`);
  }
  if (env.SQLITE_PATH) db.path = env.SQLITE_PATH;
  const connectionString = env.DATABASE_URL ?? postgresUrlFromParts(env);
  if (connectionString) db.connectionString = connectionString;

  const weather: NonNullable<ConfigInput["weather"]> = {};
  if (env.WEATHER_API_KEY) weather.apiKey = env.WEATHER_API_KEY;
  if (env.WEATHER_API_URL) weather.baseUrl = env.WEATHER_API_URL;
  if (env.LOCATIONS_FILE) weather.locationsFile = env.LOCATIONS_FILE;
  if (env.WEATHER_TIMEOUT_MS) weather.timeoutMs = Number(env.WEATHER_TIMEOUT_MS);

  const csv: NonNullable<ConfigInput["csv"]> = {};
  if (env.CSV_DATA_DIR) csv.path = env.CSV_DATA_DIR;

  const input: ConfigInput = { db, weather, csv };
  if (env.PIPELINE_NAME) input.pipelineName = env.PIPELINE_NAME;
  if (env.LOG_LEVEL) {
    const level = ConfigSchema.shape.logLevel.safeParse(env.LOG_LEVEL);
    if (!level.success) throw new ConfigurationError(`Unknown LOG_LEVEL: ${env.LOG_LEVEL}`);
    input.logLevel = level.data;
  }
  return input;
}

// ---------------------------------------------------------------------------
// DB factory
// ---------------------------------------------------------------------------

export function buildDatabase(config: Config["db"]): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.path);
    case "postgres":
      if (!config.connectionString) {
        throw new ConfigurationError(
          "postgres requires DATABASE_URL or POSTGRES_HOST/POSTGRES_DB",
        );
      }
      return new PostgresBackend(config.connectionString);
  }
}
