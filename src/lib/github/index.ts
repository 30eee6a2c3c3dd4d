export {
  GitHubSearchClient,
  buildSearchQuery,
  toSearchError,
  transformRepository,
  type GitHubSearchClientOptions,
} from "./search-client";
export type {
  RateLimitInfo,
  RepositorySearchProvider,
  RepositorySearchResult,
  SearchFilters,
  SearchOptions,
} from "../../types/github";
