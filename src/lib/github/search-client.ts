import { Octokit, type RestEndpointMethodTypes } from "@octokit/rest";
import { retry } from "@octokit/plugin-retry";
import { throttling } from "@octokit/plugin-throttling";
import { RequestError } from "@octokit/request-error";
import { logger } from "../logger";
import { GITHUB_SEARCH_RESULT_CAP } from "../config";
import {
  AuthError,
  SearchTimeoutError,
  RateLimitError,
  AbuseLimitError,
  GitHubAPIError,
} from "../errors";
import type {
  RateLimitInfo,
  RepositorySearchProvider,
  RepositorySearchResult,
  SearchFilters,
  SearchOptions,
} from "../../types/github";

// Create custom Octokit with plugins
const MyOctokit = Octokit.plugin(retry, throttling);

type SearchItem = RestEndpointMethodTypes["search"]["repos"]["response"]["data"]["items"][number];

export interface GitHubSearchClientOptions {
  githubToken?: string;
  searchTimeoutMs?: number;
  perPage?: number;
  maxResultsPerKeyword?: number;
  /** Retries the retry plugin makes for 5xx responses */
  requestRetries?: number;
  /** Retries on secondary (abuse) rate limits before giving up */
  secondaryRateLimitRetries?: number;
  /** Turns off the throttling plugin's request spacing and limit handling */
  throttle?: boolean;
  baseUrl?: string;
  fetch?: typeof globalThis.fetch;
}

const DEFAULT_SEARCH_TIMEOUT_MS = 60000;
const DEFAULT_ABUSE_RETRY_AFTER_SECONDS = 60;

/**
 * Build the repository search query for one keyword. Multi-word keywords
 * are quoted so GitHub matches them as a phrase.
 */
export function buildSearchQuery(keyword: string, filters: SearchFilters): string {
  const term = keyword.replace(/"/g, "").trim();
  const phrase = /\s/.test(term) ? `"${term}"` : term;
  return `${phrase} in:name,description stars:>=${filters.minStars} forks:>=${filters.minForks}`;
}

/**
 * Transform GitHub API response to our result format
 */
export function transformRepository(repo: SearchItem): RepositorySearchResult {
  return {
    id: repo.id,
    name: repo.name,
    fullName: repo.full_name,
    owner: repo.owner?.login ?? repo.full_name.split("/")[0],
    description: repo.description,
    stars: repo.stargazers_count,
    forks: repo.forks_count,
    language: repo.language,
    topics: repo.topics ?? [],
    url: repo.html_url,
    homepage: repo.homepage,
    createdAt: repo.created_at,
    updatedAt: repo.updated_at,
    pushedAt: repo.pushed_at || null,
    isArchived: repo.archived,
    license: repo.license?.name ?? null,
    defaultBranch: repo.default_branch,
  };
}

function headerValue(error: RequestError, name: string): string | undefined {
  const value = error.response?.headers[name];
  return value === undefined ? undefined : String(value);
}

/**
 * Map an Octokit failure onto the error classes the exporter understands
 */
export function toSearchError(error: unknown): Error {
  if (!(error instanceof RequestError)) {
    const message = error instanceof Error ? error.message : String(error);
    return new GitHubAPIError(`Search request failed: ${message}`, undefined, error);
  }

  if (error.status === 401) {
    return new AuthError("GitHub rejected the token (401 Bad credentials)", 401);
  }

  if (error.status === 403 || error.status === 429) {
    if (headerValue(error, "x-ratelimit-remaining") === "0") {
      const reset = headerValue(error, "x-ratelimit-reset");
      const retryAfter = reset ? Math.max(0, parseInt(reset, 10) - Math.floor(Date.now() / 1000)) : undefined;
      return new RateLimitError("GitHub API rate limit exceeded", retryAfter);
    }

    const retryAfterHeader = headerValue(error, "retry-after");
    if (retryAfterHeader || /secondary rate limit|abuse/i.test(error.message)) {
      // retry-after may also be an HTTP date
      const seconds = retryAfterHeader ? parseInt(retryAfterHeader, 10) : NaN;
      const retryAfter = Number.isFinite(seconds) ? seconds : DEFAULT_ABUSE_RETRY_AFTER_SECONDS;
      return new AbuseLimitError("GitHub secondary rate limit triggered", retryAfter);
    }

    if (error.status === 429) {
      return new RateLimitError("GitHub API rate limit exceeded");
    }
  }

  return new GitHubAPIError(`Search failed: ${error.message}`, error.status, error);
}

/**
 * GitHub repository search backed by Octokit with the retry and throttling
 * plugins. Primary rate limits are surfaced as RateLimitError so the caller
 * owns the backoff; secondary limits are retried here a few times.
 */
export class GitHubSearchClient implements RepositorySearchProvider {
  private octokit: InstanceType<typeof MyOctokit>;
  private searchTimeoutMs: number;
  private perPage: number;
  private maxResults: number;

  constructor(searchConfig: GitHubSearchClientOptions = {}) {
    this.searchTimeoutMs = searchConfig.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.perPage = Math.min(searchConfig.perPage ?? 100, 100);
    this.maxResults = Math.min(searchConfig.maxResultsPerKeyword ?? GITHUB_SEARCH_RESULT_CAP, GITHUB_SEARCH_RESULT_CAP);
    const secondaryRateLimitRetries = searchConfig.secondaryRateLimitRetries ?? 2;

    this.octokit = new MyOctokit({
      auth: searchConfig.githubToken,
      baseUrl: searchConfig.baseUrl,
      userAgent: "repo-search-exporter",
      request: { fetch: searchConfig.fetch },
      log: {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.info(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.error(message),
      },
      retry: {
        enabled: (searchConfig.requestRetries ?? 2) > 0,
        retries: searchConfig.requestRetries ?? 2,
        doNotRetry: [400, 401, 403, 404, 422, 429],
      },
      throttle: {
        enabled: searchConfig.throttle ?? true,
        onRateLimit: (retryAfter, options) => {
          logger.warn(
            `Rate limit detected for request ${options.method} ${options.url}. Resets in ${retryAfter} seconds.`
          );
          return false;
        },
        onSecondaryRateLimit: (retryAfter, options, _octokit, retryCount) => {
          logger.warn(
            `Secondary rate limit (abuse detection) for ${options.method} ${options.url}. Retry #${retryCount + 1} after ${retryAfter} seconds.`
          );

          if (retryCount < secondaryRateLimitRetries) {
            return true;
          }

          logger.error("Max abuse limit retries exceeded");
          return false;
        },
      },
    });
  }

  /**
   * Check rate limit status
   */
  async checkRateLimit(): Promise<RateLimitInfo> {
    try {
      const { data } = await this.octokit.rateLimit.get();
      const search = data.resources.search;

      logger.info({
        remaining: search.remaining,
        limit: search.limit,
        reset: new Date(search.reset * 1000).toISOString(),
      }, "GitHub API rate limit status");

      return {
        limit: search.limit,
        remaining: search.remaining,
        reset: search.reset,
        used: search.limit - search.remaining,
      };
    } catch (error) {
      logger.error({ err: error }, "Failed to check rate limit");
      throw toSearchError(error);
    }
  }

  /**
   * Search repositories for one keyword, filtered server-side by thresholds
   */
  async search(keyword: string, filters: SearchFilters): Promise<RepositorySearchResult[]> {
    return this.searchRepositories(buildSearchQuery(keyword, filters), {
      perPage: this.perPage,
      maxResults: this.maxResults,
    });
  }

  /**
   * Run a raw search query, following pages until a short page, an
   * incomplete result set or maxResults
   */
  async searchRepositories(
    query: string,
    options: SearchOptions = {}
  ): Promise<RepositorySearchResult[]> {
    const startTime = Date.now();
    const { perPage = this.perPage, maxResults = this.maxResults, sort = "stars", order = "desc" } = options;

    logger.info({ query }, "Starting repository search");

    const results: RepositorySearchResult[] = [];
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.searchTimeoutMs);
    let page = 1;

    try {
      while (results.length < maxResults) {
        logger.debug(`Fetching page ${page} with ${perPage} results per page`);

        const response = await this.octokit.search.repos({
          q: query,
          sort,
          order,
          per_page: perPage,
          page,
          request: { signal: controller.signal },
        });

        logger.debug(`Found ${response.data.total_count} total results, fetched ${response.data.items.length} on page ${page}`);

        for (const repo of response.data.items) {
          if (results.length >= maxResults) break;
          results.push(transformRepository(repo));
        }

        if (!response.data.incomplete_results &&
            response.data.items.length === perPage &&
            page * perPage < GITHUB_SEARCH_RESULT_CAP) {
          page++;
        } else {
          break;
        }
      }

      logger.info(`Search completed in ${Date.now() - startTime}ms, fetched ${results.length} repositories`);
      return results;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new SearchTimeoutError(`Search timeout after ${this.searchTimeoutMs}ms`);
      }
      throw toSearchError(error);
    } finally {
      clearTimeout(timer);
    }
  }
}
