/**
 * meteo-etl – batch ETL for weather observations and CSV business records.
 */
import { buildDatabase, configFromEnv, parseConfig, type Config, type ConfigInput } from "./config.js";
import { UnsupportedSourceError } from "./core/exceptions.js";
import type { PipelineResult } from "./core/types.js";
import { withDatabase, type DatabaseBackend } from "./db/backend.js";
import { createLogger, type Logger } from "./logger.js";
import { getSourceFactory } from "./sources/registry.js";

export { SourceType } from "./sources/registry.js";
export type { PipelineResult, RunStatus, WeatherRecord, CsvRecord } from "./core/types.js";
export type { Config, ConfigInput } from "./config.js";

export class MeteoEtl {
  private config: Config;
  private logger: Logger;
  private acquire: () => DatabaseBackend;
  private fetchImpl?: typeof fetch;

  constructor(
    config: Config,
    opts: { logger?: Logger; acquire?: () => DatabaseBackend; fetch?: typeof fetch } = {},
  ) {
    this.config = config;
    this.logger = opts.logger ?? createLogger({ level: config.logLevel });
    this.acquire = opts.acquire ?? (() => buildDatabase(config.db));
    this.fetchImpl = opts.fetch;
  }

  /** Construct from a configuration dict (validates with Zod). */
  static fromConfig(raw: ConfigInput = {}): MeteoEtl {
    return new MeteoEtl(parseConfig(raw));
  }

  /** Construct from environment variables. */
  static fromEnv(env: Record<string, string | undefined> = process.env): MeteoEtl {
    return MeteoEtl.fromConfig(configFromEnv(env));
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Run one source end to end on a single database connection, acquired
   * here and released on every exit path.
   */
  async runSource(source: string): Promise<PipelineResult> {
    const factory = getSourceFactory(source);
    if (!factory) {
      throw new UnsupportedSourceError(`Unsupported source: ${source}`);
    }

    return withDatabase(this.acquire, async (db) => {
      const pipeline = factory({
        config: this.config,
        db,
        logger: this.logger,
        fetch: this.fetchImpl,
      });
      return pipeline.run();
    });
  }
}
