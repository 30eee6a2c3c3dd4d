import type { ExporterConfig } from "./config";
import { runWithConcurrency } from "./concurrency";
import { enrichRepository, getDefaultTaxonomy, type Taxonomy } from "./enrich";
import { AuthError, NoResultsError, errorMessage } from "./errors";
import { GitHubSearchClient, type GitHubSearchClientOptions } from "./github";
import { logger } from "./logger";
import { mergeRecords, readExistingRecords, sortRecords, writeCsvOutput, writeJsonOutput } from "./output";
import { delay, retryWithBackoff } from "./retry";
import type {
  ExportReport,
  KeywordFailure,
  RateLimitInfo,
  RepoRecord,
  RepositorySearchProvider,
  RepositorySearchResult,
  SearchFilters,
  SearchQuery,
} from "../types/github";

type KeywordOutcome =
  | { ok: true; keyword: string; repos: RepositorySearchResult[] }
  | { ok: false; keyword: string; failure: KeywordFailure };

export interface ExporterOptions {
  taxonomy?: Taxonomy;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Whether a repository belongs in the output of this query
 */
export function qualifies(repo: RepositorySearchResult, query: SearchQuery): boolean {
  return meetsThresholds(repo, query) && matchingKeywords(repo, query.keywords).length > 0;
}

export function meetsThresholds(repo: RepositorySearchResult, filters: SearchFilters): boolean {
  return repo.stars >= filters.minStars && repo.forks >= filters.minForks;
}

/**
 * Query keywords found (case-insensitively) in the repository's name or description
 */
export function matchingKeywords(repo: RepositorySearchResult, keywords: readonly string[]): string[] {
  const haystack = `${repo.name}\n${repo.description ?? ""}`.toLowerCase();
  return keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Searches every keyword of a query, keeps the repositories that meet the
 * thresholds and name a keyword, and writes them out sorted.
 */
export class RepositoryExporter {
  private readonly taxonomy: Taxonomy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: ExporterConfig,
    private readonly provider: RepositorySearchProvider,
    options: ExporterOptions = {}
  ) {
    this.taxonomy = options.taxonomy ?? getDefaultTaxonomy();
    this.sleep = options.sleep ?? delay;
  }

  /**
   * @throws AuthError when the token is missing or rejected (nothing is written)
   * @throws NoResultsError when no keyword could be searched
   * @throws ExportIOError when the output cannot be written
   */
  async run(): Promise<ExportReport> {
    if (!this.config.token) {
      throw new AuthError("GITHUB_TOKEN is not set; a GitHub token is required to search repositories");
    }

    const { query, outputFile, csvFile } = this.config;
    const filters: SearchFilters = { minStars: query.minStars, minForks: query.minForks };

    logger.info(
      { keywords: query.keywords, minStars: query.minStars, minForks: query.minForks },
      "Searching GitHub repositories"
    );

    const rateLimit = await this.checkQuota(query.keywords.length);

    const outcomes = await runWithConcurrency(
      query.keywords,
      (keyword) => this.fetchKeyword(keyword, filters),
      this.config.concurrency
    );

    const succeededKeywords: string[] = [];
    const failures: KeywordFailure[] = [];
    const found: RepositorySearchResult[] = [];

    for (const outcome of outcomes) {
      if (outcome.ok) {
        succeededKeywords.push(outcome.keyword);
        found.push(...outcome.repos);
      } else {
        failures.push(outcome.failure);
      }
    }

    if (succeededKeywords.length === 0) {
      throw new NoResultsError(
        `No results could be fetched: every keyword search failed (${failures.map((f) => f.keyword).join(", ")})`,
        failures.map((f) => f.keyword)
      );
    }

    let records = this.collect(found, query);
    logger.info(`Found ${records.length} repositories after filtering`);

    if (this.config.mergeExisting) {
      const existing = await readExistingRecords(outputFile);
      const kept = existing.filter((record) => qualifies(record, query));
      if (kept.length < existing.length) {
        logger.info(`Dropping ${existing.length - kept.length} existing records that no longer match the query`);
      }
      records = mergeRecords(kept, records);
      logger.info(`Merged with ${kept.length} existing records, ${records.length} in total`);
    }

    await writeJsonOutput(outputFile, records);
    if (csvFile) {
      await writeCsvOutput(csvFile, records);
    }

    if (failures.length > 0) {
      logger.warn(
        { failed: failures.map((f) => f.keyword) },
        `${failures.length} of ${query.keywords.length} keyword searches failed; results cover the rest`
      );
    }

    return { records, succeededKeywords, failures, outputFile, csvFile, rateLimit };
  }

  /**
   * Ask the provider for the remaining search quota, when it can tell.
   * A rejected token aborts the run; any other failure only costs the check.
   */
  private async checkQuota(searches: number): Promise<RateLimitInfo | undefined> {
    if (!this.provider.checkRateLimit) return undefined;

    try {
      const rateLimit = await this.provider.checkRateLimit();
      if (rateLimit.remaining < searches) {
        logger.warn(
          `Only ${rateLimit.remaining} searches left before ${new Date(rateLimit.reset * 1000).toISOString()}; ${searches} keywords queued`
        );
      }
      return rateLimit;
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      logger.warn(`Could not check the search rate limit: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async fetchKeyword(keyword: string, filters: SearchFilters): Promise<KeywordOutcome> {
    let attempts = 0;

    try {
      const repos = await retryWithBackoff(
        () => {
          attempts++;
          return this.provider.search(keyword, filters);
        },
        {
          ...this.config.retry,
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              `Search for "${keyword}" failed (${error.message}). Retry ${attempt}/${this.config.retry.maxRetries} in ${delayMs}ms`
            );
          },
        }
      );

      logger.info(`Keyword "${keyword}": ${repos.length} repositories returned`);
      return { ok: true, keyword, repos };
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }

      logger.error(`Giving up on keyword "${keyword}" after ${attempts} attempt(s): ${errorMessage(error)}`);
      return { ok: false, keyword, failure: { keyword, error: errorMessage(error), attempts } };
    }
  }

  /**
   * Filter, deduplicate by repository id and enrich
   */
  private collect(found: RepositorySearchResult[], query: SearchQuery): RepoRecord[] {
    const unique = new Map<number, RepositorySearchResult>();

    for (const repo of found) {
      if (!unique.has(repo.id)) {
        unique.set(repo.id, repo);
      }
    }

    const records: RepoRecord[] = [];
    for (const repo of unique.values()) {
      if (!meetsThresholds(repo, query)) continue;

      const matched = matchingKeywords(repo, query.keywords);
      if (matched.length === 0) {
        logger.debug(`Skipping ${repo.fullName}: no keyword in name or description`);
        continue;
      }

      records.push(enrichRepository(repo, matched, this.taxonomy));
    }

    return sortRecords(records);
  }
}

export function searchClientOptions(config: ExporterConfig): GitHubSearchClientOptions {
  return {
    githubToken: config.token,
    searchTimeoutMs: config.search.timeoutMs,
    perPage: config.search.perPage,
    maxResultsPerKeyword: config.search.maxResultsPerKeyword,
    requestRetries: config.search.requestRetries,
    secondaryRateLimitRetries: config.search.secondaryRateLimitRetries,
    throttle: config.search.throttle,
  };
}

/**
 * Exporter wired to the GitHub search API
 */
export function createExporter(config: ExporterConfig, options: ExporterOptions = {}): RepositoryExporter {
  return new RepositoryExporter(config, new GitHubSearchClient(searchClientOptions(config)), options);
}
