import { mkdtemp, rm } from "fs/promises";
import { basename, dirname, join, resolve } from "path";
import { tmpdir } from "os";

import { deepMerge, type DeepPartial } from "../config/loader.js";
import { PatchflowConfigSchema, type PatchflowConfig } from "../config/schema.js";
import type { Finding } from "../core/types/index.js";

const TEMP_PREFIX = "patchflow-test-";

/** Fresh project directory under the system temp root. */
export async function createTempDir(): Promise<string> {
  return resolve(await mkdtemp(join(tmpdir(), TEMP_PREFIX)));
}

/** Removes a directory made by createTempDir, and nothing else. */
export async function cleanupTempDir(dirPath: string): Promise<void> {
  const absolutePath = resolve(dirPath);
  if (dirname(absolutePath) !== resolve(tmpdir()) || !basename(absolutePath).startsWith(TEMP_PREFIX)) {
    throw new Error(`Refusing to remove ${absolutePath}: not a patchflow test directory`);
  }
  await rm(absolutePath, { recursive: true, force: true });
}

/**
 * Builds a scan finding. Defaults describe a fixable SQL injection.
 */
export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    classification: "True Bug",
    action: "Fix",
    rule_description: "SQL injection",
    file_path: "src/db.py",
    type: "VULNERABILITY",
    ...overrides,
  };
}

export function makeConfig(overrides: DeepPartial<PatchflowConfig> = {}): PatchflowConfig {
  return PatchflowConfigSchema.parse(deepMerge({ output: { save: false } }, overrides));
}

export const TEST_API_KEY = "test-secret";
