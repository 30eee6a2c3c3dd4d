#!/usr/bin/env tsx

// .env must be loaded before the logger reads LOG_LEVEL
import "dotenv/config";
import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import { loadExporterConfig, type ConfigOverrides, type ExporterConfig } from "./lib/config";
import { displayResults, summarizeReport } from "./lib/display";
import { ValidationError, errorMessage } from "./lib/errors";
import { createExporter, type RepositoryExporter } from "./lib/exporter";
import { logger } from "./lib/logger";

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createExporter?: (config: ExporterConfig) => RepositoryExporter;
  writeErr?: (text: string) => void;
}

function buildProgram(writeErr: (text: string) => void): Command {
  return new Command()
    .name("repo-search-exporter")
    .description("Search GitHub repositories by keyword and export the matches as JSON")
    .option("-k, --keywords <list>", "comma-separated keywords (env: KEYWORDS_ENV)")
    .option("--min-stars <n>", "minimum stars, default 10 (env: MIN_STARS)")
    .option("--min-forks <n>", "minimum forks, default 10 (env: MIN_FORKS)")
    .option("-o, --output <file>", "JSON output path, default results/data.json (env: OUTPUT_FILE)")
    .option("--csv <file>", "also write a CSV copy (env: CSV_FILE)")
    .option("--merge", "keep records from an existing output file (env: MERGE_EXISTING)")
    .option("-c, --concurrency <n>", "keywords searched in parallel, 1-10 (env: SEARCH_CONCURRENCY)")
    .option("-m, --max-results <n>", "results fetched per keyword, up to 1000 (env: MAX_RESULTS_PER_KEYWORD)")
    .exitOverride()
    .configureOutput({ writeErr });
}

/**
 * Print a fatal error where CI logs will show it
 */
function reportFatal(error: unknown, writeErr: (text: string) => void): void {
  const name = error instanceof Error ? error.name : "Error";
  logger.error({ err: error }, "Export failed");

  writeErr(`${name}: ${errorMessage(error)}\n`);
  if (error instanceof ValidationError && error.issues.length > 1) {
    for (const issue of error.issues) {
      writeErr(`  - ${issue}\n`);
    }
  }
}

/**
 * Run the exporter for the given arguments and return the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));
  const program = buildProgram(writeErr);

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const overrides = program.opts<ConfigOverrides>();

  try {
    const config = loadExporterConfig(env, overrides);
    const exporter = (deps.createExporter ?? createExporter)(config);
    const report = await exporter.run();

    displayResults(report.records);
    logger.info(summarizeReport(report));
    return 0;
  } catch (error) {
    reportFatal(error, writeErr);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script || !existsSync(script)) return false;
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
