/**
 * DDL for both dialects. Timestamps are stored as ISO-8601 text in SQLite and
 * as TIMESTAMPTZ in PostgreSQL.
 */

export const SQLITE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS pipeline_runs (
  run_id            INTEGER PRIMARY KEY AUTOINCREMENT,
  pipeline_name     TEXT NOT NULL,
  source_type       TEXT NOT NULL,
  status            TEXT NOT NULL CHECK (status IN ('running', 'success', 'partial', 'failed')),
  records_extracted INTEGER NOT NULL DEFAULT 0,
  records_validated INTEGER NOT NULL DEFAULT 0,
  records_loaded    INTEGER NOT NULL DEFAULT 0,
  records_failed    INTEGER NOT NULL DEFAULT 0,
  start_time        TEXT NOT NULL,
  end_time          TEXT,
  duration_seconds  REAL,
  error_message     TEXT,
  metadata          TEXT,
  created_at        TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS stg_weather_data (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  city              TEXT,
  country           TEXT,
  temperature       REAL,
  feels_like        REAL,
  humidity          REAL,
  pressure          REAL,
  weather_condition TEXT,
  wind_speed        REAL,
  observed_at       TEXT,
  raw_data          TEXT,
  extracted_at      TEXT NOT NULL,
  run_id            INTEGER NOT NULL REFERENCES pipeline_runs(run_id)
);

CREATE TABLE IF NOT EXISTS stg_csv_data (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  source_file  TEXT,
  row_number   INTEGER,
  raw_data     TEXT,
  extracted_at TEXT NOT NULL,
  run_id       INTEGER NOT NULL REFERENCES pipeline_runs(run_id)
);

CREATE TABLE IF NOT EXISTS weather_metrics (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  city              TEXT NOT NULL,
  country           TEXT NOT NULL,
  temperature       REAL NOT NULL,
  feels_like        REAL,
  humidity          REAL CHECK (humidity BETWEEN 0 AND 100),
  pressure          REAL,
  weather_condition TEXT,
  wind_speed        REAL CHECK (wind_speed >= 0),
  recorded_at       TEXT NOT NULL,
  loaded_at         TEXT NOT NULL,
  UNIQUE (city, country, recorded_at)
);

CREATE TABLE IF NOT EXISTS error_log (
  error_id      INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id        INTEGER REFERENCES pipeline_runs(run_id),
  source_type   TEXT NOT NULL,
  error_type    TEXT,
  error_message TEXT NOT NULL,
  error_details TEXT,
  raw_data      TEXT,
  retry_count   INTEGER NOT NULL DEFAULT 0,
  resolved      INTEGER NOT NULL DEFAULT 0,
  created_at    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_stg_weather_extracted_at ON stg_weather_data(extracted_at);
CREATE INDEX IF NOT EXISTS idx_stg_weather_run_id ON stg_weather_data(run_id);
CREATE INDEX IF NOT EXISTS idx_stg_csv_extracted_at ON stg_csv_data(extracted_at);
CREATE INDEX IF NOT EXISTS idx_stg_csv_run_id ON stg_csv_data(run_id);
CREATE INDEX IF NOT EXISTS idx_weather_city_country ON weather_metrics(city, country);
CREATE INDEX IF NOT EXISTS idx_weather_recorded_at ON weather_metrics(recorded_at);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_status ON pipeline_runs(status);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_source ON pipeline_runs(source_type);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_start_time ON pipeline_runs(start_time);
CREATE INDEX IF NOT EXISTS idx_error_log_run_id ON error_log(run_id);
CREATE INDEX IF NOT EXISTS idx_error_log_created_at ON error_log(created_at);
`;

export const POSTGRES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS pipeline_runs (
  run_id            SERIAL PRIMARY KEY,
  pipeline_name     VARCHAR(100) NOT NULL,
  source_type       VARCHAR(50) NOT NULL,
  status            VARCHAR(20) NOT NULL CHECK (status IN ('running', 'success', 'partial', 'failed')),
  records_extracted INTEGER NOT NULL DEFAULT 0,
  records_validated INTEGER NOT NULL DEFAULT 0,
  records_loaded    INTEGER NOT NULL DEFAULT 0,
  records_failed    INTEGER NOT NULL DEFAULT 0,
  start_time        TIMESTAMPTZ NOT NULL,
  end_time          TIMESTAMPTZ,
  duration_seconds  DOUBLE PRECISION,
  error_message     TEXT,
  metadata          JSONB,
  created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS stg_weather_data (
  id                SERIAL PRIMARY KEY,
  city              VARCHAR(100),
  country           VARCHAR(100),
  temperature       DOUBLE PRECISION,
  feels_like        DOUBLE PRECISION,
  humidity          DOUBLE PRECISION,
  pressure          DOUBLE PRECISION,
  weather_condition VARCHAR(100),
  wind_speed        DOUBLE PRECISION,
  observed_at       TIMESTAMPTZ,
  raw_data          JSONB,
  extracted_at      TIMESTAMPTZ NOT NULL,
  run_id            INTEGER NOT NULL REFERENCES pipeline_runs(run_id)
);

CREATE TABLE IF NOT EXISTS stg_csv_data (
  id           SERIAL PRIMARY KEY,
  source_file  VARCHAR(255),
  row_number   INTEGER,
  raw_data     JSONB,
  extracted_at TIMESTAMPTZ NOT NULL,
  run_id       INTEGER NOT NULL REFERENCES pipeline_runs(run_id)
);

CREATE TABLE IF NOT EXISTS weather_metrics (
  id                SERIAL PRIMARY KEY,
  city              VARCHAR(100) NOT NULL,
  country           VARCHAR(100) NOT NULL,
  temperature       DOUBLE PRECISION NOT NULL,
  feels_like        DOUBLE PRECISION,
  humidity          DOUBLE PRECISION CHECK (humidity BETWEEN 0 AND 100),
  pressure          DOUBLE PRECISION,
  weather_condition VARCHAR(100),
  wind_speed        DOUBLE PRECISION CHECK (wind_speed >= 0),
  recorded_at       TIMESTAMPTZ NOT NULL,
  loaded_at         TIMESTAMPTZ NOT NULL,
  UNIQUE (city, country, recorded_at)
);

CREATE TABLE IF NOT EXISTS error_log (
  error_id      SERIAL PRIMARY KEY,
  run_id        INTEGER REFERENCES pipeline_runs(run_id),
  source_type   VARCHAR(50) NOT NULL,
  error_type    VARCHAR(50),
  error_message TEXT NOT NULL,
  error_details JSONB,
  raw_data      JSONB,
  retry_count   INTEGER NOT NULL DEFAULT 0,
  resolved      BOOLEAN NOT NULL DEFAULT FALSE,
  created_at    TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_stg_weather_extracted_at ON stg_weather_data(extracted_at);
CREATE INDEX IF NOT EXISTS idx_stg_weather_run_id ON stg_weather_data(run_id);
CREATE INDEX IF NOT EXISTS idx_stg_csv_extracted_at ON stg_csv_data(extracted_at);
CREATE INDEX IF NOT EXISTS idx_stg_csv_run_id ON stg_csv_data(run_id);
CREATE INDEX IF NOT EXISTS idx_weather_city_country ON weather_metrics(city, country);
CREATE INDEX IF NOT EXISTS idx_weather_recorded_at ON weather_metrics(recorded_at);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_status ON pipeline_runs(status);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_source ON pipeline_runs(source_type);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_start_time ON pipeline_runs(start_time);
CREATE INDEX IF NOT EXISTS idx_error_log_run_id ON error_log(run_id);
CREATE INDEX IF NOT EXISTS idx_error_log_created_at ON error_log(created_at);
`;
