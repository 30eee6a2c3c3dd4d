import { createSearchQuery, loadExporterConfig, type ExporterConfig } from "./src/lib/config";
import { createExporter, RepositoryExporter, type ExporterOptions } from "./src/lib/exporter";
import type { ExportReport, RepositorySearchProvider } from "./src/types/github";

export * from "./src/types/github";
export * from "./src/lib/errors";
export { GitHubSearchClient, buildSearchQuery, type GitHubSearchClientOptions } from "./src/lib/github";
export { RepositoryExporter, createExporter, matchingKeywords, meetsThresholds, qualifies } from "./src/lib/exporter";
export { createSearchQuery, loadExporterConfig, parseKeywords } from "./src/lib/config";
export type { ConfigOverrides, ExporterConfig, RetrySettings, SearchSettings } from "./src/lib/config";
export { displayResults } from "./src/lib/display";
export { toCsv, sortRecords, mergeRecords } from "./src/lib/output";
export { loadTaxonomy, type Taxonomy } from "./src/lib/enrich";
export { logger, createLogger } from "./src/lib/logger";

/**
 * Export in one call: keywords and thresholds are given directly, the rest
 * of the settings come from the environment.
 */
export async function exportRepositories(
  options: {
    keywords: string[];
    minStars?: number;
    minForks?: number;
    outputFile?: string;
    token?: string;
    provider?: RepositorySearchProvider;
  } & ExporterOptions
): Promise<ExportReport> {
  const base = loadExporterConfig({ ...process.env, KEYWORDS_ENV: options.keywords.join(",") });
  const config: ExporterConfig = {
    ...base,
    token: options.token ?? base.token,
    query: createSearchQuery(options.keywords, options.minStars, options.minForks),
    outputFile: options.outputFile ?? base.outputFile,
  };

  const exporter = options.provider
    ? new RepositoryExporter(config, options.provider, options)
    : createExporter(config, options);

  return exporter.run();
}
