/**
 * Unit tests for the weather rule set.
 */
import { describe, test, expect } from "vitest";

import { createWeatherValidator, weatherRules } from "../src/validators/weather.js";
import { logger, weatherRecord } from "./fixtures.js";

describe("weatherRules", () => {
  test("accepts a complete in-range record", () => {
    expect(weatherRules(weatherRecord())).toEqual([]);
  });

  test("accepts values on the range boundaries", () => {
    expect(
      weatherRules(weatherRecord({ temperature: -50, humidity: 0, pressure: 900, windSpeed: 0 })),
    ).toEqual([]);
    expect(weatherRules(weatherRecord({ temperature: 60, humidity: 100, pressure: 1100 }))).toEqual(
      [],
    );
  });

  test("only the temperature fails when the rest are in range", () => {
    const errors = weatherRules(
      weatherRecord({ temperature: 150, humidity: 34, pressure: 1006, windSpeed: 7.2 }),
    );
    expect(errors).toEqual(["Temperature out of range: 150 (expected -50 to 60)"]);
  });

  test("NaN fails its range check", () => {
    expect(weatherRules(weatherRecord({ temperature: Number.NaN, windSpeed: Number.NaN }))).toEqual([
      "Temperature out of range: NaN (expected -50 to 60)",
      "Negative wind speed: NaN",
    ]);
  });

  test("reports every range violation in order", () => {
    const errors = weatherRules(
      weatherRecord({ temperature: -51, humidity: 120, windSpeed: -1, pressure: 800 }),
    );
    expect(errors).toEqual([
      "Temperature out of range: -51 (expected -50 to 60)",
      "Humidity out of range: 120% (expected 0 to 100)",
      "Negative wind speed: -1",
      "Pressure out of range: 800 hPa (expected 900 to 1100)",
    ]);
  });

  test("missing fields short-circuit the range checks", () => {
    expect(weatherRules(weatherRecord({ country: null, temperature: 150 }))).toEqual([
      "Missing or null field: country",
    ]);
  });

  test("names every missing field", () => {
    expect(weatherRules(weatherRecord({ city: null, windSpeed: null, humidity: null }))).toEqual([
      "Missing or null field: city",
      "Missing or null field: humidity",
      "Missing or null field: wind_speed",
    ]);
  });

  test("optional fields may be null", () => {
    expect(
      weatherRules(weatherRecord({ feelsLike: null, weatherCondition: null, observedAt: null })),
    ).toEqual([]);
  });
});

describe("weather BatchValidator", () => {
  test("partitions a batch and keeps input order", () => {
    const validator = createWeatherValidator(logger);
    const records = [
      weatherRecord({ city: "Asuncion" }),
      weatherRecord({ city: "Pilar", temperature: 150 }),
      weatherRecord({ city: "Encarnacion" }),
      weatherRecord({ city: null }),
    ];

    const result = validator.validateBatch(records);

    expect(result.totalRecords).toBe(4);
    expect(result.validCount).toBe(2);
    expect(result.invalidCount).toBe(2);
    expect(result.validCount + result.invalidCount).toBe(result.totalRecords);
    expect(result.validRecords.map((r) => r.city)).toEqual(["Asuncion", "Encarnacion"]);
    expect(result.invalidRecords.map((r) => r.errors)).toEqual([
      ["Temperature out of range: 150 (expected -50 to 60)"],
      ["Missing or null field: city"],
    ]);
    expect(result.invalidRecords[0]?.record).toBe(records[1]);
  });

  test("empty batch", () => {
    const result = createWeatherValidator(logger).validateBatch([]);
    expect(result).toEqual({
      totalRecords: 0,
      validCount: 0,
      invalidCount: 0,
      validRecords: [],
      invalidRecords: [],
    });
  });

  test("validateRecord reports isValid", () => {
    const validator = createWeatherValidator(logger);
    expect(validator.validateRecord(weatherRecord())).toEqual({ isValid: true, errors: [] });
    expect(validator.validateRecord(weatherRecord({ windSpeed: -3.5 }))).toEqual({
      isValid: false,
      errors: ["Negative wind speed: -3.5"],
    });
  });
});
