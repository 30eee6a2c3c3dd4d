import { describe, expect, it } from "vitest";
import {
  DEFAULT_OUTPUT_FILE,
  createSearchQuery,
  loadExporterConfig,
  parseKeywords,
} from "../../src/lib/config";
import { ValidationError } from "../../src/lib/errors";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("parseKeywords", () => {
  it("trims, drops blanks and repeats", () => {
    expect(parseKeywords(" deepseek, llama ,,DeepSeek, mistral ")).toEqual(["deepseek", "llama", "mistral"]);
  });

  it("drops double quotes so the searched and matched keyword agree", () => {
    expect(parseKeywords('deep "learning", ""')).toEqual(["deep learning"]);
  });

  it("returns nothing for a blank list", () => {
    expect(parseKeywords(" , ,")).toEqual([]);
  });
});

describe("createSearchQuery", () => {
  it("defaults thresholds to 10", () => {
    expect(createSearchQuery(["deepseek"])).toEqual({ keywords: ["deepseek"], minStars: 10, minForks: 10 });
  });

  it("returns a frozen query", () => {
    const query = createSearchQuery(["deepseek"], 1, 2);

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.keywords)).toBe(true);
  });

  it("rejects an empty keyword list and bad thresholds together", () => {
    const error = captureError(() => createSearchQuery([], -1, 1.5));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      issues: [
        "at least one keyword is required",
        "minStars must be a non-negative integer, got -1",
        "minForks must be a non-negative integer, got 1.5",
      ],
    });
  });
});

describe("loadExporterConfig", () => {
  it("reads the environment with defaults", () => {
    const config = loadExporterConfig({ GITHUB_TOKEN: "test-token", KEYWORDS_ENV: "deepseek" });

    expect(config).toEqual({
      token: "test-token",
      query: { keywords: ["deepseek"], minStars: 10, minForks: 10 },
      outputFile: DEFAULT_OUTPUT_FILE,
      csvFile: undefined,
      mergeExisting: false,
      concurrency: 1,
      retry: { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitter: false },
      search: {
        perPage: 100,
        maxResultsPerKeyword: 1000,
        timeoutMs: 60000,
        requestRetries: 2,
        secondaryRateLimitRetries: 2,
        throttle: true,
      },
    });
  });

  it("treats blank values as unset", () => {
    const config = loadExporterConfig({
      GITHUB_TOKEN: "  ",
      KEYWORDS_ENV: "a,b",
      MIN_STARS: "",
      MIN_FORKS: " ",
      OUTPUT_FILE: "",
    });

    expect(config.token).toBeUndefined();
    expect(config.query.minStars).toBe(10);
    expect(config.query.minForks).toBe(10);
    expect(config.outputFile).toBe("results/data.json");
  });

  it("lets command-line values win over the environment", () => {
    const config = loadExporterConfig(
      { KEYWORDS_ENV: "env-keyword", MIN_STARS: "5", OUTPUT_FILE: "env.json", MERGE_EXISTING: "false" },
      { keywords: "cli-keyword", minStars: "50", output: "cli.json", merge: true, concurrency: "4" }
    );

    expect(config.query.keywords).toEqual(["cli-keyword"]);
    expect(config.query.minStars).toBe(50);
    expect(config.outputFile).toBe("cli.json");
    expect(config.mergeExisting).toBe(true);
    expect(config.concurrency).toBe(4);
  });

  it("reads retry jitter and Octokit plugin settings", () => {
    const config = loadExporterConfig({
      KEYWORDS_ENV: "x",
      RETRY_JITTER: "yes",
      REQUEST_RETRIES: "0",
      SECONDARY_RATE_LIMIT_RETRIES: "5",
      GITHUB_THROTTLE: "false",
    });

    expect(config.retry.jitter).toBe(true);
    expect(config.search).toMatchObject({ requestRetries: 0, secondaryRateLimitRetries: 5, throttle: false });
  });

  it("accepts zero thresholds", () => {
    const config = loadExporterConfig({ KEYWORDS_ENV: "x", MIN_STARS: "0", MIN_FORKS: "0" });

    expect(config.query).toEqual({ keywords: ["x"], minStars: 0, minForks: 0 });
  });

  it("rejects malformed numbers with every problem listed", () => {
    const error = captureError(() =>
      loadExporterConfig({ KEYWORDS_ENV: "x", MIN_STARS: "ten", MIN_FORKS: "-3", PER_PAGE: "500" })
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      issues: [
        'MIN_STARS must be a non-negative integer, got "ten"',
        'MIN_FORKS must be a non-negative integer, got "-3"',
        "PER_PAGE must be between 1 and 100, got 500",
      ],
    });
  });

  it("rejects fractional thresholds", () => {
    expect(() => loadExporterConfig({ KEYWORDS_ENV: "x", MIN_STARS: "10.5" })).toThrow(
      'MIN_STARS must be a non-negative integer, got "10.5"'
    );
  });

  it("requires at least one keyword", () => {
    expect(() => loadExporterConfig({ GITHUB_TOKEN: "test-token" })).toThrow(
      "KEYWORDS_ENV must list at least one keyword"
    );
  });

  it("rejects an unreadable boolean", () => {
    expect(() => loadExporterConfig({ KEYWORDS_ENV: "x", MERGE_EXISTING: "maybe" })).toThrow(
      'MERGE_EXISTING must be true or false, got "maybe"'
    );
  });

  it("caps results per keyword at the search API window", () => {
    expect(() => loadExporterConfig({ KEYWORDS_ENV: "x", MAX_RESULTS_PER_KEYWORD: "5000" })).toThrow(
      "MAX_RESULTS_PER_KEYWORD must be between 1 and 1000, got 5000"
    );
  });
});
