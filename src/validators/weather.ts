/**
 * Range checks for current-weather observations.
 */
import type { Logger } from "../logger.js";
import type { WeatherRecord } from "../core/types.js";
import { BatchValidator } from "./validator.js";

export const TEMPERATURE_RANGE = { min: -50, max: 60 } as const;
export const HUMIDITY_RANGE = { min: 0, max: 100 } as const;
export const PRESSURE_RANGE = { min: 900, max: 1100 } as const;

/** Required fields, keyed by the column name used in messages and storage. */
const REQUIRED_FIELDS = [
  ["city", (r: WeatherRecord) => r.city],
  ["country", (r: WeatherRecord) => r.country],
  ["temperature", (r: WeatherRecord) => r.temperature],
  ["humidity", (r: WeatherRecord) => r.humidity],
  ["pressure", (r: WeatherRecord) => r.pressure],
  ["wind_speed", (r: WeatherRecord) => r.windSpeed],
] as const;

function within(value: number, range: { min: number; max: number }): boolean {
  return value >= range.min && value <= range.max;
}

export function weatherRules(record: WeatherRecord): string[] {
  const errors: string[] = [];

  for (const [field, get] of REQUIRED_FIELDS) {
    if (get(record) == null) {
      errors.push(`Missing or null field: ${field}`);
    }
  }

  // Partial records are not range-checked.
  if (errors.length > 0) return errors;

  const { temperature, humidity, windSpeed, pressure } = record;

  if (temperature != null && !within(temperature, TEMPERATURE_RANGE)) {
    errors.push(
      `Temperature out of range: ${temperature} (expected ${TEMPERATURE_RANGE.min} to ${TEMPERATURE_RANGE.max})`,
    );
  }

  if (humidity != null && !within(humidity, HUMIDITY_RANGE)) {
    errors.push(
      `Humidity out of range: ${humidity}% (expected ${HUMIDITY_RANGE.min} to ${HUMIDITY_RANGE.max})`,
    );
  }

  if (windSpeed != null && !(windSpeed >= 0)) {
    errors.push(`Negative wind speed: ${windSpeed}`);
  }

  if (pressure != null && !within(pressure, PRESSURE_RANGE)) {
    errors.push(
      `Pressure out of range: ${pressure} hPa (expected ${PRESSURE_RANGE.min} to ${PRESSURE_RANGE.max})`,
    );
  }

  return errors;
}

export function createWeatherValidator(logger: Logger): BatchValidator<WeatherRecord> {
  return new BatchValidator<WeatherRecord>({
    name: "weather",
    rules: weatherRules,
    logger,
    describe: (r) => r.city ?? "unknown",
  });
}
