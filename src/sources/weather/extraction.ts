/**
 * Weather API extraction: one current-conditions request per location.
 */
import type { ExtractionStrategy } from "../../core/etl.js";
import { errorMessage } from "../../core/exceptions.js";
import type { WeatherRecord } from "../../core/types.js";
import type { Logger } from "../../logger.js";
import { loadLocations, type Location } from "./locations.js";
import { WeatherApiResponseSchema, type WeatherApiResponse } from "./schemas.js";

export const DEFAULT_WEATHER_API_URL = "http://api.weatherapi.com/v1/current.json";
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface WeatherApiExtractionOptions {
  apiKey?: string;
  baseUrl?: string;
  locationsFile: string;
  timeoutMs?: number;
  logger: Logger;
  fetch?: typeof fetch;
}

function epochToIso(epoch: number | null | undefined): string | null {
  if (epoch == null) return null;
  return new Date(epoch * 1000).toISOString();
}

/** Map an API response body onto a WeatherRecord. */
export function toWeatherRecord(body: WeatherApiResponse, rawData: unknown): WeatherRecord {
  const { location, current } = body;
  return {
    city: location.name ?? null,
    country: location.country ?? null,
    temperature: current.temp_c ?? null,
    feelsLike: current.feelslike_c ?? null,
    humidity: current.humidity ?? null,
    pressure: current.pressure_mb ?? null,
    weatherCondition: current.condition?.text?.toLowerCase() ?? null,
    windSpeed: current.wind_kph ?? null,
    observedAt: epochToIso(current.last_updated_epoch),
    rawData,
  };
}

export class WeatherApiExtractionStrategy implements ExtractionStrategy<WeatherRecord> {
  private apiKey: string;
  private baseUrl: string;
  private locationsFile: string;
  private timeoutMs: number;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(opts: WeatherApiExtractionOptions) {
    this.apiKey = opts.apiKey ?? "";
    this.baseUrl = opts.baseUrl ?? DEFAULT_WEATHER_API_URL;
    this.locationsFile = opts.locationsFile;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = opts.logger.child({ component: "extractor.weather_api" });
    this.fetchImpl = opts.fetch ?? fetch;

    if (!this.apiKey || this.apiKey === "your_api_key_here") {
      this.logger.warn("Weather API key not set");
    }
  }

  async extract(): Promise<WeatherRecord[]> {
    const locations = await loadLocations(this.locationsFile);
    if (locations.length === 0) {
      throw new Error(`No locations loaded from ${this.locationsFile}`);
    }
    this.logger.info(
      { locations: locations.length, file: this.locationsFile },
      "Starting extraction from weather_api",
    );

    const records: WeatherRecord[] = [];
    for (const location of locations) {
      try {
        records.push(await this.fetchLocation(location));
        this.logger.debug({ location: location.name }, "Extracted weather data");
      } catch (err) {
        this.logger.error(
          { location: location.name, error: errorMessage(err) },
          "Failed to extract weather data",
        );
      }
    }

    this.logger.info(
      { records: records.length, locations: locations.length },
      `Extraction complete: ${records.length} records from weather_api`,
    );
    return records;
  }

  private async fetchLocation(location: Location): Promise<WeatherRecord> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("key", this.apiKey);
    url.searchParams.set("q", `${location.lat},${location.lon}`);
    url.searchParams.set("aqi", "no");

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }

      const json: unknown = await response.json();
      const parsed = WeatherApiResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new Error(`Unexpected response shape: ${parsed.error.message}`);
      }
      return toWeatherRecord(parsed.data, json);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
