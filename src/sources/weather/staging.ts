/**
 * Weather staging loader – one stg_weather_data row per record.
 */
import type { StagingLoader } from "../../core/etl.js";
import { errorMessage } from "../../core/exceptions.js";
import type { WeatherRecord } from "../../core/types.js";
import type { DatabaseBackend } from "../../db/backend.js";
import type { Logger } from "../../logger.js";

export class WeatherStagingLoader implements StagingLoader<WeatherRecord> {
  private db: DatabaseBackend;
  private logger: Logger;

  constructor(db: DatabaseBackend, logger: Logger) {
    this.db = db;
    this.logger = logger.child({ component: "loader.weather_api" });
  }

  async load(records: WeatherRecord[], runId: number): Promise<number> {
    let loaded = 0;

    for (const record of records) {
      try {
        await this.db.execute(
          `INSERT INTO stg_weather_data (
             city, country, temperature, feels_like, humidity, pressure,
             weather_condition, wind_speed, observed_at, raw_data, extracted_at, run_id
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [
            record.city,
            record.country,
            record.temperature,
            record.feelsLike,
            record.humidity,
            record.pressure,
            record.weatherCondition,
            record.windSpeed,
            record.observedAt,
            JSON.stringify(record.rawData ?? null),
            new Date().toISOString(),
            runId,
          ],
        );
        loaded++;
        this.logger.debug({ runId, city: record.city }, "Staged weather record");
      } catch (err) {
        this.logger.error(
          { runId, city: record.city, error: errorMessage(err) },
          "Failed to stage weather record",
        );
      }
    }

    this.logger.info({ runId }, `Loaded ${loaded}/${records.length} weather records`);
    return loaded;
  }
}
