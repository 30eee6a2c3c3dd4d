import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeTempDir } from "./helpers";

describe("cli environment", () => {
  let cleanup: () => void;
  let saved: NodeJS.ProcessEnv;

  beforeEach(() => {
    saved = { ...process.env };
    const temp = makeTempDir();
    cleanup = temp.cleanup;

    const envFile = join(temp.dir, ".env");
    writeFileSync(envFile, "LOG_LEVEL=debug\n");
    delete process.env.LOG_LEVEL;
    process.env.DOTENV_CONFIG_PATH = envFile;
    vi.resetModules();
  });

  afterEach(() => {
    process.env = saved;
    cleanup();
  });

  it("loads .env before the logger reads LOG_LEVEL", async () => {
    await import("../src/cli");
    const { logger } = await import("../src/lib/logger");

    expect(process.env.LOG_LEVEL).toBe("debug");
    expect(logger.level).toBe("debug");
  });
});
