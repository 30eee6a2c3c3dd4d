import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { ExportIOError, errorMessage } from "./errors";
import { logger } from "./logger";
import type { RepoRecord } from "../types/github";

const RepoRecordSchema = z.object({
  id: z.number(),
  name: z.string(),
  fullName: z.string(),
  owner: z.string(),
  description: z.string().nullable(),
  stars: z.number(),
  forks: z.number(),
  language: z.string().nullable(),
  topics: z.array(z.string()),
  url: z.string(),
  homepage: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  pushedAt: z.string().nullable(),
  isArchived: z.boolean(),
  license: z.string().nullable(),
  defaultBranch: z.string(),
  techStack: z.array(z.string()),
  keywords: z.array(z.string()),
  category: z.string(),
  matchedKeywords: z.array(z.string()),
});

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Stars descending, then full name (code-unit order, not localeCompare), then id
 */
export function compareRecords(a: RepoRecord, b: RepoRecord): number {
  return b.stars - a.stars || compareText(a.fullName, b.fullName) || a.id - b.id;
}

export function sortRecords(records: readonly RepoRecord[]): RepoRecord[] {
  return [...records].sort(compareRecords);
}

export function normalizeUrl(url: string): string {
  return url
    .toLowerCase()
    .replace(/\.git$/, "")
    .replace(/\/$/, "");
}

/**
 * Records from a previous run, or [] when the file does not exist yet
 */
export async function readExistingRecords(filePath: string): Promise<RepoRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw new ExportIOError(`Cannot read existing output ${filePath}: ${errorMessage(error)}`, filePath, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ExportIOError(`Existing output ${filePath} is not valid JSON`, filePath, error);
  }

  const parsed = z.array(RepoRecordSchema).safeParse(data);
  if (!parsed.success) {
    throw new ExportIOError(`Existing output ${filePath} is not a list of repository records`, filePath, parsed.error);
  }

  return parsed.data;
}

/**
 * Fresh records win; earlier records are kept when their URL is not among them
 */
export function mergeRecords(existing: readonly RepoRecord[], fresh: readonly RepoRecord[]): RepoRecord[] {
  const freshUrls = new Set(fresh.map((record) => normalizeUrl(record.url)));
  const kept = existing.filter((record) => !freshUrls.has(normalizeUrl(record.url)));
  return sortRecords([...fresh, ...kept]);
}

export function serializeRecords(records: readonly RepoRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

async function writeText(filePath: string, content: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new ExportIOError(`Cannot write ${filePath}: ${errorMessage(error)}`, filePath, error);
  }
}

/**
 * Save repository records to a JSON file, creating parent directories
 */
export async function writeJsonOutput(filePath: string, records: readonly RepoRecord[]): Promise<void> {
  await writeText(filePath, serializeRecords(records));
  logger.info(`Results saved to ${filePath}`);
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export const CSV_HEADERS = [
  "Name",
  "Full Name",
  "Owner",
  "Stars",
  "Forks",
  "Language",
  "Category",
  "Description",
  "URL",
  "Created",
  "Updated",
  "Topics",
];

export function toCsv(records: readonly RepoRecord[]): string {
  const rows = records.map((repo) => [
    repo.name,
    repo.fullName,
    repo.owner,
    repo.stars,
    repo.forks,
    repo.language || "",
    repo.category,
    repo.description || "",
    repo.url,
    repo.createdAt,
    repo.updatedAt,
    repo.topics.join(";"),
  ].map(csvField).join(","));

  return [CSV_HEADERS.join(","), ...rows].join("\n") + "\n";
}

/**
 * Export results to CSV format
 */
export async function writeCsvOutput(filePath: string, records: readonly RepoRecord[]): Promise<void> {
  await writeText(filePath, toCsv(records));
  logger.info(`CSV exported to ${filePath}`);
}
