import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createSearchQuery, type ExporterConfig } from "../src/lib/config";
import type { Taxonomy } from "../src/lib/enrich";
import type {
  RepositorySearchProvider,
  RepositorySearchResult,
  SearchFilters,
} from "../src/types/github";

export const TEST_TOKEN = "test-token";

export const testTaxonomy: Taxonomy = {
  techStacks: ["react", "rust", "fastapi"],
  categories: {
    game: ["game", "godot"],
    ai: ["ai", "deep learning", "chatbot"],
    devtools: ["cli", "sdk"],
  },
};

export function makeRepo(overrides: Partial<RepositorySearchResult> & { id: number }): RepositorySearchResult {
  const name = overrides.name ?? `repo-${overrides.id}`;
  const owner = overrides.owner ?? "octo";
  return {
    name,
    fullName: `${owner}/${name}`,
    owner,
    description: null,
    stars: 50,
    forks: 20,
    language: "TypeScript",
    topics: [],
    url: `https://github.com/${owner}/${name}`,
    homepage: null,
    createdAt: "2024-01-01T00:00:00Z",
    updatedAt: "2024-06-01T00:00:00Z",
    pushedAt: "2024-06-01T00:00:00Z",
    isArchived: false,
    license: "MIT License",
    defaultBranch: "main",
    ...overrides,
  };
}

export function makeConfig(
  outputFile: string,
  overrides: Partial<Omit<ExporterConfig, "query">> & { keywords?: string[]; minStars?: number; minForks?: number } = {}
): ExporterConfig {
  const { keywords = ["deepseek"], minStars = 10, minForks = 10, ...rest } = overrides;
  return {
    token: TEST_TOKEN,
    query: createSearchQuery(keywords, minStars, minForks),
    outputFile,
    mergeExisting: false,
    concurrency: 1,
    retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 10, jitter: false },
    search: {
      perPage: 100,
      maxResultsPerKeyword: 1000,
      timeoutMs: 1000,
      requestRetries: 0,
      secondaryRateLimitRetries: 0,
      throttle: false,
    },
    ...rest,
  };
}

type Responder = (filters: SearchFilters, call: number) => RepositorySearchResult[] | Error;

/**
 * In-memory provider: each keyword maps to a fixed result list or to a
 * function deciding per call what to return or throw
 */
export class FakeSearchProvider implements RepositorySearchProvider {
  readonly calls: string[] = [];

  constructor(private readonly responses: Record<string, RepositorySearchResult[] | Responder>) {}

  async search(keyword: string, filters: SearchFilters): Promise<RepositorySearchResult[]> {
    this.calls.push(keyword);
    const response = this.responses[keyword] ?? [];
    if (Array.isArray(response)) {
      return response;
    }

    const result = response(filters, this.calls.filter((k) => k === keyword).length);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  callCount(keyword: string): number {
    return this.calls.filter((k) => k === keyword).length;
  }
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "repo-export-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export const noSleep = async (): Promise<void> => {};
