import { readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError, exportRepositories } from "../search";
import { FakeSearchProvider, makeRepo, makeTempDir, noSleep, testTaxonomy } from "./helpers";

describe("exportRepositories", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it("runs an export from explicit keywords and thresholds", async () => {
    const outputFile = join(dir, "data.json");
    const provider = new FakeSearchProvider({
      deepseek: [
        makeRepo({ id: 1, name: "deepseek-coder", stars: 30, forks: 5 }),
        makeRepo({ id: 2, name: "deepseek-lite", stars: 3, forks: 5 }),
      ],
    });

    const report = await exportRepositories({
      keywords: ["deepseek"],
      minStars: 5,
      minForks: 5,
      outputFile,
      token: "test-token",
      provider,
      taxonomy: testTaxonomy,
      sleep: noSleep,
    });

    expect(report.records.map((r) => r.id)).toEqual([1]);
    expect(report.outputFile).toBe(outputFile);
    expect(JSON.parse(readFileSync(outputFile, "utf-8"))).toHaveLength(1);
  });

  it("rejects an empty keyword list", async () => {
    await expect(exportRepositories({ keywords: [], token: "test-token" })).rejects.toBeInstanceOf(ValidationError);
  });
});
