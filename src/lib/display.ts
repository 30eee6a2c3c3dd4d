import { logger } from "./logger";
import type { ExportReport, RepoRecord } from "../types/github";

/**
 * Format and display repository results
 */
export function displayResults(results: readonly RepoRecord[], limit: number = 10) {
  logger.info(`Found ${results.length} repositories`);

  results.slice(0, limit).forEach((repo, index) => {
    console.log(`\n${index + 1}. ${repo.fullName}`);
    console.log(`   Stars: ${repo.stars.toLocaleString("en-US")}`);
    console.log(`   Forks: ${repo.forks.toLocaleString("en-US")}`);
    console.log(`   Language: ${repo.language || "Not specified"}`);
    console.log(`   Category: ${repo.category}`);
    console.log(`   Description: ${repo.description?.substring(0, 100) || "No description"}`);
    if (repo.topics.length > 0) {
      console.log(`   Topics: ${repo.topics.slice(0, 5).join(", ")}`);
    }
    console.log(`   URL: ${repo.url}`);
    if (repo.isArchived) {
      console.log(`   ARCHIVED`);
    }
  });

  if (results.length > limit) {
    console.log(`\n... and ${results.length - limit} more repositories`);
  }
}

export function summarizeReport(report: ExportReport): string {
  const lines = [
    `Wrote ${report.records.length} repositories to ${report.outputFile}`,
  ];
  if (report.csvFile) {
    lines.push(`CSV copy at ${report.csvFile}`);
  }
  for (const failure of report.failures) {
    lines.push(`Keyword "${failure.keyword}" skipped after ${failure.attempts} attempt(s): ${failure.error}`);
  }
  return lines.join("\n");
}
