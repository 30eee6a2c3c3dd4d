/**
 * Type definitions for repository search and export
 */

export interface SearchQuery {
  readonly keywords: readonly string[];
  readonly minStars: number;
  readonly minForks: number;
}

export interface SearchFilters {
  minStars: number;
  minForks: number;
}

export interface SearchOptions {
  perPage?: number;
  maxResults?: number;
  sort?: "stars" | "forks" | "updated" | "help-wanted-issues";
  order?: "asc" | "desc";
}

/**
 * Repository as returned by a search provider, before enrichment
 */
export interface RepositorySearchResult {
  id: number;
  name: string;
  fullName: string;
  owner: string;
  description: string | null;
  stars: number;
  forks: number;
  language: string | null;
  topics: string[];
  url: string;
  homepage: string | null;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
  isArchived: boolean;
  license: string | null;
  defaultBranch: string;
}

export interface RepoRecord extends RepositorySearchResult {
  techStack: string[];
  keywords: string[];
  category: string;
  matchedKeywords: string[];
}

/**
 * Anything that can answer a keyword search; the exporter depends on this,
 * never on Octokit directly.
 */
export interface RepositorySearchProvider {
  search(keyword: string, filters: SearchFilters): Promise<RepositorySearchResult[]>;
  /** Remaining search quota, checked once before the keyword searches */
  checkRateLimit?(): Promise<RateLimitInfo>;
}

export interface KeywordFailure {
  keyword: string;
  error: string;
  attempts: number;
}

export interface ExportReport {
  records: RepoRecord[];
  succeededKeywords: string[];
  failures: KeywordFailure[];
  outputFile: string;
  csvFile?: string;
  rateLimit?: RateLimitInfo;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: number;
  used: number;
}
