import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import { mkdir, writeFile } from "fs/promises";

import { applyCliOverrides, resolveCliConfig } from "../../cli/config-resolver.js";
import { CliUsageError } from "../../cli/errors.js";
import { logger } from "../../utils/logger.js";
import { createTempDir, cleanupTempDir, makeConfig } from "../fixtures.js";

describe("resolveCliConfig", () => {
  let tempDir: string;
  const originalEnv = process.env;

  beforeEach(async () => {
    tempDir = await createTempDir();
    process.env = { ...originalEnv };
    delete process.env.NODE_ENV;
    delete process.env.PATCHFLOW_STRICT_CONFIG;
    vi.spyOn(logger, "warn").mockImplementation(vi.fn());
    vi.spyOn(logger, "debug").mockImplementation(vi.fn());
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it("reads the config file from cwd", async () => {
    await writeFile(join(tempDir, "patchflow.json"), JSON.stringify({ scanner: "sonar" }), "utf-8");

    const { config } = await resolveCliConfig({ cwd: tempDir });

    expect(config.scanner).toBe("sonar");
  });

  it("resolves an explicit config path relative to cwd", async () => {
    const nestedDir = join(tempDir, "nested");
    await mkdir(nestedDir, { recursive: true });
    await writeFile(join(tempDir, "team.json"), JSON.stringify({ parallel: true }), "utf-8");

    const { config } = await resolveCliConfig({ cwd: nestedDir, configPath: "../team.json" });

    expect(config.parallel).toBe(true);
  });

  it("reports loader failures as usage errors", async () => {
    await writeFile(join(tempDir, "patchflow.json"), "{ not json", "utf-8");

    await expect(resolveCliConfig({ cwd: tempDir, strictConfig: true })).rejects.toBeInstanceOf(
      CliUsageError
    );
  });
});

describe("applyCliOverrides", () => {
  it("layers flags over the resolved config and ignores unset flags", () => {
    const base = makeConfig({ scanner: "sonar", rag: { limit: 7 } });

    const config = applyCliOverrides(base, {
      scanner: undefined,
      parallel: true,
      rag: { enabled: true },
    });

    expect(config.scanner).toBe("sonar");
    expect(config.parallel).toBe(true);
    expect(config.rag).toEqual({
      enabled: true,
      limit: 7,
      combineMode: "OR",
      collection: "fixer_rag_collection",
    });
  });

  it("rejects flag values the schema refuses", () => {
    const base = makeConfig();

    expect(() => applyCliOverrides(base, { parallelTimeoutSeconds: 0 })).toThrow(CliUsageError);
  });
});
