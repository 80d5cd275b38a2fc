/**
 * Source registry – maps SourceType values to the components that make up
 * their pipeline.
 */
import { basename, dirname, extname } from "node:path";

import type { Config } from "../config.js";
import { ETLPipeline } from "../core/etl.js";
import type { PipelineResult } from "../core/types.js";
import type { DatabaseBackend } from "../db/backend.js";
import type { Logger } from "../logger.js";
import { DiskStorage } from "../storage/disk.js";
import { createCsvValidator } from "../validators/csv.js";
import { createWeatherValidator } from "../validators/weather.js";
import { CsvExtractionStrategy } from "./csv/extraction.js";
import { CsvStagingLoader } from "./csv/staging.js";
import { WeatherApiExtractionStrategy } from "./weather/extraction.js";
import { WeatherStagingLoader } from "./weather/staging.js";
import { WeatherTransformer } from "./weather/transform.js";

// ---------------------------------------------------------------------------
// Source enum
// ---------------------------------------------------------------------------

export enum SourceType {
  WeatherApi = "weather_api",
  CsvFile = "csv_file",
}

// ---------------------------------------------------------------------------
// Build context
// ---------------------------------------------------------------------------

export interface SourceContext {
  config: Config;
  db: DatabaseBackend;
  logger: Logger;
  /** Overrides the global fetch for the weather source. */
  fetch?: typeof fetch;
}

/** Something that can run one pipeline end to end. */
export interface RunnablePipeline {
  run(): Promise<PipelineResult>;
}

export type SourceFactory = (ctx: SourceContext) => RunnablePipeline;

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function buildWeatherPipeline(ctx: SourceContext): RunnablePipeline {
  const { config, db, logger } = ctx;
  return new ETLPipeline({
    pipelineName: config.pipelineName,
    sourceType: SourceType.WeatherApi,
    extraction: new WeatherApiExtractionStrategy({
      apiKey: config.weather.apiKey,
      baseUrl: config.weather.baseUrl,
      locationsFile: config.weather.locationsFile,
      timeoutMs: config.weather.timeoutMs,
      logger,
      fetch: ctx.fetch,
    }),
    validator: createWeatherValidator(logger),
    loader: new WeatherStagingLoader(db, logger),
    transformer: new WeatherTransformer(db, logger),
    db,
    logger,
  });
}

/** A path ending in .csv is read on its own; anything else is a folder. */
export function csvStorageFor(path: string): { storage: DiskStorage; prefix: string } {
  if (extname(path).toLowerCase() === ".csv") {
    return { storage: new DiskStorage(dirname(path)), prefix: basename(path) };
  }
  return { storage: new DiskStorage(path), prefix: "" };
}

function buildCsvPipeline(ctx: SourceContext): RunnablePipeline {
  const { config, db, logger } = ctx;
  const { storage, prefix } = csvStorageFor(config.csv.path);
  return new ETLPipeline({
    pipelineName: config.pipelineName,
    sourceType: SourceType.CsvFile,
    extraction: new CsvExtractionStrategy({ storage, prefix, logger }),
    validator: createCsvValidator(logger),
    loader: new CsvStagingLoader(db, logger),
    db,
    logger,
  });
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const SOURCE_REGISTRY: Record<string, SourceFactory> = {
  [SourceType.WeatherApi]: buildWeatherPipeline,
  [SourceType.CsvFile]: buildCsvPipeline,
};

export function getSourceFactory(source: string): SourceFactory | null {
  return SOURCE_REGISTRY[source] ?? null;
}
