#!/usr/bin/env node
/**
 * CLI entrypoint for meteo-etl.
 *
 * Usage:
 *   meteo-etl                                  # weather API → weather_metrics
 *   meteo-etl --source csv --csv-path ./data/raw
 */
import "dotenv/config";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { configFromEnv, parseConfig } from "./config.js";
import { errorMessage } from "./core/exceptions.js";
import { MeteoEtl, SourceType } from "./index.js";
import { createLogger, type Logger } from "./logger.js";

const USAGE = `
meteo-etl: batch ETL for weather observations and CSV records

Usage:
  meteo-etl [--source weather|csv] [--csv-path <path>] [--db-path <file>]

Options:
  --source <name>      weather (default) or csv
  --csv-path <path>    CSV file or folder        (default: $CSV_DATA_DIR or ./data/raw)
  --db-path <file>     SQLite database           (default: $SQLITE_PATH or ./meteo-etl.db)
  --help               Show this help
`.trim();

const SOURCES: Record<string, SourceType> = {
  weather: SourceType.WeatherApi,
  csv: SourceType.CsvFile,
};

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      source: { type: "string", default: "weather" },
      "csv-path": { type: "string" },
      "db-path": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  }).values;
}

export interface CliOptions {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  fetch?: typeof fetch;
}

/** Run the CLI; resolves to the process exit code. */
export async function main(
  argv: string[] = process.argv.slice(2),
  opts: CliOptions = {},
): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs(argv);
  } catch (err) {
    console.error(`${errorMessage(err)}\n\n${USAGE}`);
    return 1;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const sourceName = values.source ?? "weather";
  const source = SOURCES[sourceName];
  if (!source) {
    console.error(`Unknown source: ${sourceName}\n\n${USAGE}`);
    return 1;
  }

  let logger = opts.logger;
  try {
    const input = configFromEnv(opts.env ?? process.env);
    if (values["csv-path"]) input.csv = { ...input.csv, path: values["csv-path"] };
    if (values["db-path"]) input.db = { ...input.db, path: values["db-path"] };
    const config = parseConfig(input);
    logger ??= createLogger({ level: config.logLevel });

    const etl = new MeteoEtl(config, { logger, fetch: opts.fetch });
    const result = await etl.runSource(source);
    logger.info({ result }, `Run ${result.runId} finished with status: ${result.status}`);
    return 0;
  } catch (err) {
    (logger ?? createLogger()).fatal({ error: errorMessage(err) }, "Fatal error");
    return 1;
  }
}

/** True when this module is the process entry point (also via the npm bin symlink). */
function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(errorMessage(err));
      process.exitCode = 1;
    },
  );
}
