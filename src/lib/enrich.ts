import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ValidationError } from "./errors";
import type { RepoRecord, RepositorySearchResult } from "../types/github";

const TaxonomySchema = z.object({
  techStacks: z.array(z.string().min(1)),
  categories: z.record(z.array(z.string().min(1))),
});

export type Taxonomy = z.infer<typeof TaxonomySchema>;

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(new URL("../../data/taxonomy.json", import.meta.url));

export const UNCATEGORIZED = "other";

let defaultTaxonomy: Taxonomy | null = null;

/**
 * Read the tech-stack and category term lists
 */
export function loadTaxonomy(path: string = DEFAULT_TAXONOMY_PATH): Taxonomy {
  const parsed = TaxonomySchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid taxonomy file ${path}`, issues);
  }
  return parsed.data;
}

export function getDefaultTaxonomy(): Taxonomy {
  if (!defaultTaxonomy) {
    defaultTaxonomy = loadTaxonomy();
  }
  return defaultTaxonomy;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word, case-insensitive match, so "ai" does not fire on "chain"
 */
export function containsTerm(text: string, term: string): boolean {
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(term.toLowerCase())}(?![a-z0-9])`);
  return pattern.test(text.toLowerCase());
}

export function extractTechStack(description: string | null, taxonomy: Taxonomy): string[] {
  if (!description) return [];
  return taxonomy.techStacks.filter((tech) => containsTerm(description, tech));
}

/**
 * Unique lowercase word tokens of a description, sorted
 */
export function extractKeywords(description: string | null): string[] {
  if (!description) return [];
  const tokens = description.toLowerCase().match(/[a-z0-9]+(?:-[a-z0-9]+)*/g) ?? [];
  return [...new Set(tokens)].sort();
}

export function categorize(description: string | null, taxonomy: Taxonomy): string {
  if (!description) return UNCATEGORIZED;

  for (const [category, terms] of Object.entries(taxonomy.categories)) {
    if (terms.some((term) => containsTerm(description, term))) {
      return category;
    }
  }

  return UNCATEGORIZED;
}

export function enrichRepository(
  repo: RepositorySearchResult,
  matchedKeywords: string[],
  taxonomy: Taxonomy
): RepoRecord {
  return {
    ...repo,
    techStack: extractTechStack(repo.description, taxonomy),
    keywords: extractKeywords(repo.description),
    category: categorize(repo.description, taxonomy),
    matchedKeywords,
  };
}
