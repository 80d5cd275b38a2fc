/**
 * Zod schemas for the weather API response and for staged weather rows.
 *
 * Measurement fields are nullish on purpose: a malformed reading must reach
 * the validator so it ends up in error_log instead of vanishing.
 */
import { z } from "zod";

const nullableNumber = z.number().nullish();

export const WeatherApiLocationSchema = z.object({
  name: z.string().nullish(),
  country: z.string().nullish(),
  lat: nullableNumber,
  lon: nullableNumber,
  localtime_epoch: nullableNumber,
});

export const WeatherApiCurrentSchema = z.object({
  last_updated_epoch: nullableNumber,
  temp_c: nullableNumber,
  feelslike_c: nullableNumber,
  humidity: nullableNumber,
  pressure_mb: nullableNumber,
  wind_kph: nullableNumber,
  condition: z.object({ text: z.string().nullish() }).nullish(),
});

export const WeatherApiResponseSchema = z.object({
  location: WeatherApiLocationSchema,
  current: WeatherApiCurrentSchema,
});

export type WeatherApiResponse = z.infer<typeof WeatherApiResponseSchema>;

/** Timestamps come back as ISO text from SQLite and as Date from postgres. */
const timestamp = z
  .union([z.string(), z.date()])
  .transform((v) => (v instanceof Date ? v.toISOString() : new Date(v).toISOString()));

const numeric = z.number().finite();

export const StagedWeatherRowSchema = z.object({
  id: z.number().int(),
  city: z.string().min(1),
  country: z.string().min(1),
  temperature: numeric,
  feels_like: numeric.nullable(),
  humidity: numeric.nullable(),
  pressure: numeric.nullable(),
  weather_condition: z.string().nullable(),
  wind_speed: numeric.nullable(),
  observed_at: timestamp.nullable(),
  extracted_at: timestamp,
  run_id: z.number().int(),
});

export type StagedWeatherRow = z.infer<typeof StagedWeatherRowSchema>;
