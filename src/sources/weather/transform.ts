/**
 * Staged weather rows → weather_metrics, upserted on (city, country, recorded_at).
 */
import type { Transformer } from "../../core/etl.js";
import { errorMessage } from "../../core/exceptions.js";
import type { TransformStats } from "../../core/types.js";
import type { DatabaseBackend, DbRow } from "../../db/backend.js";
import type { Logger } from "../../logger.js";
import { StagedWeatherRowSchema } from "./schemas.js";

/** A row shaped for weather_metrics. */
export interface WeatherMetric {
  city: string;
  country: string;
  temperature: number;
  feelsLike: number | null;
  humidity: number | null;
  pressure: number | null;
  weatherCondition: string | null;
  windSpeed: number | null;
  recordedAt: string;
  loadedAt: string;
}

/** Round to one decimal place, halves away from zero. */
export function roundOne(value: number): number {
  const scaled = Number((Math.abs(value) * 10).toPrecision(15));
  return (Math.sign(value) * Math.round(scaled)) / 10 || 0;
}

function roundNullable(value: number | null): number | null {
  return value == null ? null : roundOne(value);
}

export class WeatherTransformer implements Transformer {
  private db: DatabaseBackend;
  private logger: Logger;
  private now: () => Date;

  constructor(db: DatabaseBackend, logger: Logger, opts: { now?: () => Date } = {}) {
    this.db = db;
    this.logger = logger.child({ component: "transformer.weather" });
    this.now = opts.now ?? (() => new Date());
  }

  /** Normalise one staged row. Throws when the row lacks a required value. */
  transformRecord(row: DbRow): WeatherMetric {
    const staged = StagedWeatherRowSchema.parse(row);
    return {
      city: staged.city.toUpperCase(),
      country: staged.country,
      temperature: roundOne(staged.temperature),
      feelsLike: roundNullable(staged.feels_like),
      humidity: staged.humidity,
      pressure: staged.pressure,
      weatherCondition: staged.weather_condition?.toLowerCase() ?? null,
      windSpeed: roundNullable(staged.wind_speed),
      recordedAt: staged.observed_at ?? staged.extracted_at,
      loadedAt: this.now().toISOString(),
    };
  }

  async getStagingRecords(runId: number): Promise<DbRow[]> {
    const rows = await this.db.query(
      `SELECT id, city, country, temperature, feels_like, humidity, pressure,
              weather_condition, wind_speed, observed_at, extracted_at, run_id
       FROM stg_weather_data
       WHERE run_id = ?
       ORDER BY extracted_at, id`,
      [runId],
    );
    this.logger.info({ runId }, `Retrieved ${rows.length} staging records`);
    return rows;
  }

  /** Upsert each metric; returns how many were written. */
  async loadToProduction(metrics: WeatherMetric[]): Promise<number> {
    let loaded = 0;

    for (const m of metrics) {
      try {
        await this.db.execute(
          `INSERT INTO weather_metrics (
             city, country, temperature, feels_like, humidity, pressure,
             weather_condition, wind_speed, recorded_at, loaded_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (city, country, recorded_at) DO UPDATE SET
             temperature = excluded.temperature,
             feels_like = excluded.feels_like,
             humidity = excluded.humidity,
             pressure = excluded.pressure,
             weather_condition = excluded.weather_condition,
             wind_speed = excluded.wind_speed,
             loaded_at = excluded.loaded_at`,
          [
            m.city,
            m.country,
            m.temperature,
            m.feelsLike,
            m.humidity,
            m.pressure,
            m.weatherCondition,
            m.windSpeed,
            m.recordedAt,
            m.loadedAt,
          ],
        );
        loaded++;
      } catch (err) {
        this.logger.error(
          { city: m.city, recordedAt: m.recordedAt, error: errorMessage(err) },
          "Failed to load record into weather_metrics",
        );
      }
    }

    return loaded;
  }

  async transformAndLoad(runId: number): Promise<TransformStats> {
    this.logger.info({ runId }, "Starting transformation and loading");

    const staged = await this.getStagingRecords(runId);
    if (staged.length === 0) {
      this.logger.warn({ runId }, "No staging records found");
      return { recordsTransformed: 0, recordsLoaded: 0 };
    }

    const metrics: WeatherMetric[] = [];
    for (const row of staged) {
      try {
        metrics.push(this.transformRecord(row));
      } catch (err) {
        this.logger.error(
          { runId, stagingId: row.id, error: errorMessage(err) },
          "Failed to transform staging record",
        );
      }
    }
    this.logger.info({ runId }, `Transformed ${metrics.length} records`);

    const loaded = await this.loadToProduction(metrics);
    this.logger.info({ runId }, `Loaded ${loaded} records into production`);

    return { recordsTransformed: metrics.length, recordsLoaded: loaded };
  }
}
