import { isAbsolute, resolve } from "path";
import { z } from "zod";

import { deepMerge, loadConfig, type DeepPartial, type LoadedConfig } from "../config/loader.js";
import { PatchflowConfigSchema, type PatchflowConfig } from "../config/schema.js";
import { errorMessage } from "../core/errors.js";
import { CliUsageError } from "./errors.js";

interface ResolveCliConfigParams {
  strictConfig?: boolean;
  configPath?: string;
  verbose?: boolean;
  cwd?: string;
}

export async function resolveCliConfig(params: ResolveCliConfigParams): Promise<LoadedConfig> {
  const cwd = params.cwd ?? process.cwd();

  let resolvedConfigPath = params.configPath;
  if (resolvedConfigPath && !isAbsolute(resolvedConfigPath)) {
    resolvedConfigPath = resolve(cwd, resolvedConfigPath);
  }

  try {
    return await loadConfig(
      cwd,
      {},
      {
        strict: !!params.strictConfig,
        configPath: resolvedConfigPath,
        verbose: params.verbose,
      }
    );
  } catch (err) {
    throw new CliUsageError(errorMessage(err));
  }
}

/** Layers command-line flags over an already resolved configuration. */
export function applyCliOverrides(
  config: PatchflowConfig,
  overrides: DeepPartial<PatchflowConfig>
): PatchflowConfig {
  const result = PatchflowConfigSchema.safeParse(deepMerge(config, overrides));
  if (!result.success) {
    throw new CliUsageError(`Invalid command-line options:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}
