/**
 * Exporter configuration: environment variables and CLI flags are parsed
 * once into an explicit ExporterConfig that the rest of the code receives.
 */

import { z } from "zod";
import { ValidationError } from "./errors";
import type { SearchQuery } from "../types/github";

export const DEFAULT_MIN_STARS = 10;
export const DEFAULT_MIN_FORKS = 10;
export const DEFAULT_OUTPUT_FILE = "results/data.json";

// GitHub search never returns more than the first 1000 matches of a query
export const GITHUB_SEARCH_RESULT_CAP = 1000;

export interface RetrySettings {
  // Retries per keyword after the first attempt
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface SearchSettings {
  perPage: number;
  maxResultsPerKeyword: number;
  timeoutMs: number;
  // Octokit plugin settings
  requestRetries: number;
  secondaryRateLimitRetries: number;
  throttle: boolean;
}

export interface ExporterConfig {
  token?: string;
  query: SearchQuery;
  outputFile: string;
  csvFile?: string;
  mergeExisting: boolean;
  concurrency: number;
  retry: RetrySettings;
  search: SearchSettings;
}

/**
 * Values given on the command line; each one wins over its environment variable
 */
export interface ConfigOverrides {
  keywords?: string;
  minStars?: string;
  minForks?: string;
  output?: string;
  csv?: string;
  merge?: boolean;
  concurrency?: string;
  maxResults?: string;
}

/**
 * Split a comma-separated keyword list, dropping double quotes, blanks and
 * repeats (case-insensitive, first spelling wins). A keyword is searched
 * and matched in this form.
 */
export function parseKeywords(raw: string): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const part of raw.split(",")) {
    const keyword = part.replace(/"/g, "").trim();
    if (!keyword || seen.has(keyword.toLowerCase())) continue;
    seen.add(keyword.toLowerCase());
    keywords.push(keyword);
  }

  return keywords;
}

/**
 * Build an immutable SearchQuery, rejecting empty keyword lists and
 * negative or fractional thresholds
 */
export function createSearchQuery(
  keywords: readonly string[],
  minStars: number = DEFAULT_MIN_STARS,
  minForks: number = DEFAULT_MIN_FORKS
): SearchQuery {
  const cleaned = parseKeywords(keywords.join(","));
  const issues: string[] = [];

  if (cleaned.length === 0) {
    issues.push("at least one keyword is required");
  }
  if (!Number.isSafeInteger(minStars) || minStars < 0) {
    issues.push(`minStars must be a non-negative integer, got ${minStars}`);
  }
  if (!Number.isSafeInteger(minForks) || minForks < 0) {
    issues.push(`minForks must be a non-negative integer, got ${minForks}`);
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid search query: ${issues.join("; ")}`, issues);
  }

  return Object.freeze({
    keywords: Object.freeze(cleaned),
    minStars,
    minForks,
  });
}

/**
 * Integer setting from a string. Blank means "use the default", which is
 * what CI passes for an input left empty.
 */
function intSetting(name: string, defaultValue: number, min: number = 0, max: number = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const value = raw?.trim();
      if (!value) return defaultValue;

      if (!/^\d+$/.test(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be a non-negative integer, got "${raw}"`,
        });
        return z.NEVER;
      }

      const parsed = Number(value);
      if (parsed < min || parsed > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be between ${min} and ${max}, got ${parsed}`,
        });
        return z.NEVER;
      }

      return parsed;
    });
}

function boolSetting(name: string, defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const value = raw?.trim().toLowerCase();
      if (!value) return defaultValue;
      if (["true", "1", "yes"].includes(value)) return true;
      if (["false", "0", "no"].includes(value)) return false;

      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must be true or false, got "${raw}"`,
      });
      return z.NEVER;
    });
}

const optionalText = z
  .string()
  .optional()
  .transform((raw) => raw?.trim() || undefined);

const SettingsSchema = z.object({
  token: optionalText,
  keywords: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const keywords = parseKeywords(raw ?? "");
      if (keywords.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "KEYWORDS_ENV must list at least one keyword",
        });
        return z.NEVER;
      }
      return keywords;
    }),
  minStars: intSetting("MIN_STARS", DEFAULT_MIN_STARS),
  minForks: intSetting("MIN_FORKS", DEFAULT_MIN_FORKS),
  outputFile: optionalText.transform((value) => value ?? DEFAULT_OUTPUT_FILE),
  csvFile: optionalText,
  mergeExisting: boolSetting("MERGE_EXISTING", false),
  concurrency: intSetting("SEARCH_CONCURRENCY", 1, 1, 10),
  maxRetries: intSetting("MAX_RETRIES", 3, 0, 20),
  baseDelayMs: intSetting("RETRY_BASE_DELAY", 1000),
  maxDelayMs: intSetting("MAX_RETRY_DELAY", 60000),
  jitter: boolSetting("RETRY_JITTER", false),
  timeoutMs: intSetting("SEARCH_TIMEOUT", 60000, 1),
  perPage: intSetting("PER_PAGE", 100, 1, 100),
  maxResultsPerKeyword: intSetting("MAX_RESULTS_PER_KEYWORD", GITHUB_SEARCH_RESULT_CAP, 1, GITHUB_SEARCH_RESULT_CAP),
  requestRetries: intSetting("REQUEST_RETRIES", 2, 0, 10),
  secondaryRateLimitRetries: intSetting("SECONDARY_RATE_LIMIT_RETRIES", 2, 0, 10),
  throttle: boolSetting("GITHUB_THROTTLE", true),
});

/**
 * Load and validate the exporter configuration.
 *
 * A missing token is not a validation problem here: the exporter reports
 * it as an AuthError before making any request.
 *
 * @throws ValidationError listing every malformed setting
 */
export function loadExporterConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ExporterConfig {
  const parsed = SettingsSchema.safeParse({
    token: env.GITHUB_TOKEN,
    keywords: overrides.keywords ?? env.KEYWORDS_ENV,
    minStars: overrides.minStars ?? env.MIN_STARS,
    minForks: overrides.minForks ?? env.MIN_FORKS,
    outputFile: overrides.output ?? env.OUTPUT_FILE,
    csvFile: overrides.csv ?? env.CSV_FILE,
    mergeExisting: overrides.merge !== undefined ? String(overrides.merge) : env.MERGE_EXISTING,
    concurrency: overrides.concurrency ?? env.SEARCH_CONCURRENCY,
    maxRetries: env.MAX_RETRIES,
    baseDelayMs: env.RETRY_BASE_DELAY,
    maxDelayMs: env.MAX_RETRY_DELAY,
    jitter: env.RETRY_JITTER,
    timeoutMs: env.SEARCH_TIMEOUT,
    perPage: env.PER_PAGE,
    maxResultsPerKeyword: overrides.maxResults ?? env.MAX_RESULTS_PER_KEYWORD,
    requestRetries: env.REQUEST_RETRIES,
    secondaryRateLimitRetries: env.SECONDARY_RATE_LIMIT_RETRIES,
    throttle: env.GITHUB_THROTTLE,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const settings = parsed.data;

  return {
    token: settings.token,
    query: createSearchQuery(settings.keywords, settings.minStars, settings.minForks),
    outputFile: settings.outputFile,
    csvFile: settings.csvFile,
    mergeExisting: settings.mergeExisting,
    concurrency: settings.concurrency,
    retry: {
      maxRetries: settings.maxRetries,
      baseDelayMs: settings.baseDelayMs,
      maxDelayMs: settings.maxDelayMs,
      jitter: settings.jitter,
    },
    search: {
      perPage: settings.perPage,
      maxResultsPerKeyword: settings.maxResultsPerKeyword,
      timeoutMs: settings.timeoutMs,
      requestRetries: settings.requestRetries,
      secondaryRateLimitRetries: settings.secondaryRateLimitRetries,
      throttle: settings.throttle,
    },
  };
}
