import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";

import { loadConfig } from "../../config/loader.js";
import { logger } from "../../utils/logger.js";
import { cleanupTempDir, createTempDir, TEST_API_KEY } from "../fixtures.js";

describe(".env loading", () => {
  let tempDir: string;
  const originalEnv = process.env;

  async function writeDotenv(name: string, lines: string[]): Promise<string> {
    const path = join(tempDir, name);
    await writeFile(path, lines.join("\n") + "\n");
    return path;
  }

  beforeEach(async () => {
    tempDir = await createTempDir();
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("PATCHFLOW_")) delete process.env[key];
    }
    delete process.env.NODE_ENV;
    delete process.env.CI;
    vi.spyOn(logger, "warn").mockImplementation(vi.fn());
    vi.spyOn(logger, "debug").mockImplementation(vi.fn());
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it("reads service settings and the api key from ./.env in development", async () => {
    await writeDotenv(".env", [
      "PATCHFLOW_SCAN_URL=http://scanner.test:9001",
      `PATCHFLOW_API_KEY=${TEST_API_KEY}`,
    ]);

    const { config, secrets } = await loadConfig(tempDir);

    expect(config.services.scan.baseUrl).toBe("http://scanner.test:9001");
    expect(secrets.apiKey).toBe(TEST_API_KEY);
    expect(JSON.stringify(config)).not.toContain(TEST_API_KEY);
  });

  it("keeps process env over .env unless overriding is enabled", async () => {
    await writeDotenv(".env", ["PATCHFLOW_PARALLEL_TIMEOUT=30"]);
    process.env.PATCHFLOW_PARALLEL_TIMEOUT = "90";

    const kept = await loadConfig(tempDir);
    expect(kept.config.parallelTimeoutSeconds).toBe(90);

    process.env.PATCHFLOW_DOTENV_OVERRIDE = "1";
    const overridden = await loadConfig(tempDir);
    expect(overridden.config.parallelTimeoutSeconds).toBe(30);
  });

  it("skips ./.env when implicit loading is turned off", async () => {
    await writeDotenv(".env", ["PATCHFLOW_PARALLEL_TIMEOUT=30"]);

    const { config } = await loadConfig(tempDir, {}, { allowImplicitDotenv: false });

    expect(config.parallelTimeoutSeconds).toBe(600);
  });

  it("ignores ./.env in CI unless PATCHFLOW_LOAD_DOTENV=1", async () => {
    await writeDotenv(".env", ["PATCHFLOW_PARALLEL_TIMEOUT=30"]);
    process.env.CI = "true";

    expect((await loadConfig(tempDir)).config.parallelTimeoutSeconds).toBe(600);

    process.env.PATCHFLOW_LOAD_DOTENV = "1";
    expect((await loadConfig(tempDir)).config.parallelTimeoutSeconds).toBe(30);
  });

  it("ignores ./.env in production without an explicit opt-in", async () => {
    await writeDotenv(".env", ["PATCHFLOW_PARALLEL_TIMEOUT=30"]);
    process.env.NODE_ENV = "production";

    const { config } = await loadConfig(tempDir);

    expect(config.parallelTimeoutSeconds).toBe(600);
  });

  it.each([
    {
      name: "no path",
      env: {},
      error: "In production, PATCHFLOW_DOTENV_PATH must be set to load a .env file. Implicit loading from CWD is disabled.",
    },
    {
      name: "a relative path",
      env: { PATCHFLOW_DOTENV_PATH: "./config/.env" },
      error: "In production, PATCHFLOW_DOTENV_PATH must be an absolute path.",
    },
    {
      name: "an unacknowledged override",
      env: { PATCHFLOW_DOTENV_PATH: "/etc/patchflow/.env", PATCHFLOW_DOTENV_OVERRIDE: "1" },
      error:
        "In production, overriding environment variables via .env requires PATCHFLOW_DOTENV_OVERRIDE_ACK=I_UNDERSTAND.",
    },
  ])("refuses production loading with $name", async ({ env, error }) => {
    process.env.NODE_ENV = "production";
    process.env.PATCHFLOW_LOAD_DOTENV = "1";
    Object.assign(process.env, env);

    await expect(loadConfig(tempDir)).rejects.toThrow(error);
  });

  it("loads an absolute production path and warns without naming it", async () => {
    const dotenvPath = await writeDotenv("prod.env", ["PATCHFLOW_PARALLEL_TIMEOUT=30"]);
    process.env.NODE_ENV = "production";
    process.env.PATCHFLOW_LOAD_DOTENV = "1";
    process.env.PATCHFLOW_DOTENV_PATH = dotenvPath;

    const { config } = await loadConfig(tempDir);

    expect(config.parallelTimeoutSeconds).toBe(30);
    expect(logger.warn).toHaveBeenCalledWith(
      "Loaded dotenv configuration in production (path hidden for security)"
    );
  });

  it("overrides process env in production once acknowledged", async () => {
    const dotenvPath = await writeDotenv("prod.env", ["PATCHFLOW_PARALLEL_TIMEOUT=30"]);
    process.env.NODE_ENV = "production";
    process.env.PATCHFLOW_LOAD_DOTENV = "1";
    process.env.PATCHFLOW_DOTENV_PATH = dotenvPath;
    process.env.PATCHFLOW_DOTENV_OVERRIDE = "1";
    process.env.PATCHFLOW_DOTENV_OVERRIDE_ACK = "I_UNDERSTAND";
    process.env.PATCHFLOW_PARALLEL_TIMEOUT = "90";

    const { config } = await loadConfig(tempDir);

    expect(config.parallelTimeoutSeconds).toBe(30);
  });

  it("fails on a missing explicit path outside production", async () => {
    process.env.PATCHFLOW_DOTENV_PATH = join(tempDir, "missing.env");

    await expect(loadConfig(tempDir)).rejects.toThrow(
      "Dotenv file not found: missing.env. Use --verbose to see the full path."
    );
  });

  it("rejects an invalid timeout coming from .env", async () => {
    await writeDotenv(".env", ["PATCHFLOW_PARALLEL_TIMEOUT=-5"]);

    await expect(loadConfig(tempDir)).rejects.toThrow(
      "Invalid environment variables: PATCHFLOW_PARALLEL_TIMEOUT"
    );
  });
});
