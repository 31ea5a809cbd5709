import { config as loadDotenv } from "dotenv";
import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join, isAbsolute, basename } from "path";
import { z, ZodError } from "zod";

import { PatchflowConfigSchema, type PatchflowConfig } from "./schema.js";
import { logger } from "../utils/logger.js";

/**
 * Paths in log and error messages are reduced to their basename unless
 * running verbose outside production.
 */
function formatPathForLog(path: string, verbose = false): string {
  const isProduction = process.env.NODE_ENV === "production";
  if (isProduction || !verbose) {
    return basename(path);
  }
  return path;
}

function pathHint(verbose: boolean): string {
  if (process.env.NODE_ENV === "production") {
    return " Full paths are hidden for security in production.";
  }
  return verbose ? "" : " Use --verbose to see the full path.";
}

const CONFIG_FILES = ["patchflow.json", ".patchflowrc", ".patchflowrc.json"];
const ENV_BOOL = z
  .enum(["0", "1"])
  .optional()
  .transform((v: string | undefined) => v === "1");

export const PatchflowEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  PATCHFLOW_SCAN_URL: z.url().optional(),
  PATCHFLOW_FIX_URL: z.url().optional(),
  PATCHFLOW_RAG_URL: z.url().optional(),
  PATCHFLOW_API_KEY: z.string().optional(),
  PATCHFLOW_PARALLEL_TIMEOUT: z.coerce.number().positive().optional(),
  PATCHFLOW_LOAD_DOTENV: ENV_BOOL,
  PATCHFLOW_DOTENV_OVERRIDE: ENV_BOOL,
  PATCHFLOW_DOTENV_OVERRIDE_ACK: z.string().optional(),
  PATCHFLOW_DOTENV_PATH: z.string().optional(),
  PATCHFLOW_STRICT_CONFIG: ENV_BOOL,
  PATCHFLOW_DEBUG_DIAGNOSTICS: ENV_BOOL,
  PATCHFLOW_DEBUG_DIAGNOSTICS_ACK: z.string().optional(),
});

export interface ConfigLoaderOptions {
  strict?: boolean;
  configPath?: string;
  verbose?: boolean;
  allowImplicitDotenv?: boolean;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[]
    ? DeepPartial<U>[]
    : T[P] extends object | undefined | null
      ? DeepPartial<NonNullable<T[P]>>
      : T[P];
};

/** Credentials are returned beside the config, never inside it. */
export interface PatchflowSecrets {
  apiKey?: string;
}

export interface LoadedConfig {
  config: PatchflowConfig;
  secrets: PatchflowSecrets;
}

function loadDotenvFile(cwd: string, options: ConfigLoaderOptions): void {
  const isProduction = process.env.NODE_ENV === "production";
  const explicitDotenvPath = process.env.PATCHFLOW_DOTENV_PATH;
  const inCI = process.env.CI === "true" || process.env.CI === "1";

  // Production and CI need an explicit opt-in; local development loads ./.env
  const shouldLoadDotenv =
    isProduction || inCI
      ? process.env.PATCHFLOW_LOAD_DOTENV === "1"
      : (options.allowImplicitDotenv ?? true);

  if (!shouldLoadDotenv) {
    return;
  }

  let dotenvPath: string;
  if (isProduction) {
    if (!explicitDotenvPath) {
      throw new Error(
        "In production, PATCHFLOW_DOTENV_PATH must be set to load a .env file. Implicit loading from CWD is disabled."
      );
    }
    if (!isAbsolute(explicitDotenvPath)) {
      throw new Error("In production, PATCHFLOW_DOTENV_PATH must be an absolute path.");
    }
    if (
      process.env.PATCHFLOW_DOTENV_OVERRIDE === "1" &&
      process.env.PATCHFLOW_DOTENV_OVERRIDE_ACK !== "I_UNDERSTAND"
    ) {
      throw new Error(
        "In production, overriding environment variables via .env requires PATCHFLOW_DOTENV_OVERRIDE_ACK=I_UNDERSTAND."
      );
    }
    dotenvPath = explicitDotenvPath;
  } else {
    dotenvPath = explicitDotenvPath ?? join(cwd, ".env");
  }

  if (existsSync(dotenvPath)) {
    loadDotenv({
      path: dotenvPath,
      override: process.env.PATCHFLOW_DOTENV_OVERRIDE === "1",
    });
    if (isProduction) {
      logger.warn("Loaded dotenv configuration in production (path hidden for security)");
    } else {
      logger.debug(`Loaded .env configuration from ${dotenvPath}`, true);
    }
  } else if (explicitDotenvPath) {
    const verbose = options.verbose ?? false;
    throw new Error(
      `Dotenv file not found: ${formatPathForLog(explicitDotenvPath, verbose)}.${pathHint(verbose)}`
    );
  }
}

/**
 * Resolves the workflow configuration. Precedence, lowest first: schema
 * defaults, config file, environment, `overrides` (CLI flags).
 */
export async function loadConfig(
  cwd: string = process.cwd(),
  overrides: DeepPartial<PatchflowConfig> = {},
  options: ConfigLoaderOptions = {}
): Promise<LoadedConfig> {
  loadDotenvFile(cwd, options);

  const envParsed = PatchflowEnvSchema.safeParse(process.env);
  if (!envParsed.success) {
    const invalidVars = envParsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`Invalid environment variables: ${invalidVars}`);
  }
  const env = envParsed.data;

  const isStrict =
    (options.strict ?? false) || env.PATCHFLOW_STRICT_CONFIG || env.NODE_ENV === "production";
  const verbose = options.verbose ?? false;

  let fileConfig: DeepPartial<PatchflowConfig> = {};

  const loadConfigFile = async (filepath: string): Promise<boolean> => {
    const safePath = formatPathForLog(filepath, verbose);

    try {
      const content = await readFile(filepath, "utf-8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch {
        const msg = `Malformed JSON in config file: ${safePath}`;
        if (isStrict) {
          throw new Error(msg);
        }
        logger.warn(msg);
        return false;
      }

      const result = PatchflowConfigSchema.partial().safeParse(parsed);
      if (result.success) {
        fileConfig = result.data;
        logger.debug(`Loaded config from ${safePath}`, true);
        return true;
      }

      const msg = `Invalid config in ${safePath}:\n${result.error.issues
        .map((i) => `- ${i.path.join(".")}: ${i.message}`)
        .join("\n")}`;
      if (isStrict) {
        throw new Error(msg);
      }
      logger.warn(msg);
      return false;
    } catch (err) {
      if (isStrict) throw err;
      return false;
    }
  };

  if (options.configPath) {
    const configPath = isAbsolute(options.configPath)
      ? options.configPath
      : join(cwd, options.configPath);

    if (!existsSync(configPath)) {
      throw new Error(
        `Config file not found: ${formatPathForLog(configPath, verbose)}.${pathHint(verbose)}`
      );
    }
    await loadConfigFile(configPath);
  } else {
    for (const filename of CONFIG_FILES) {
      const filepath = join(cwd, filename);
      if (existsSync(filepath) && (await loadConfigFile(filepath))) {
        break;
      }
    }
  }

  if (Object.keys(fileConfig).length === 0) {
    logger.debug("No config file found, using defaults and environment variables", true);
  }

  const envConfig: DeepPartial<PatchflowConfig> = {
    parallelTimeoutSeconds: env.PATCHFLOW_PARALLEL_TIMEOUT,
    services: {
      scan: { baseUrl: env.PATCHFLOW_SCAN_URL },
      fix: { baseUrl: env.PATCHFLOW_FIX_URL },
      rag: { baseUrl: env.PATCHFLOW_RAG_URL },
    },
  };

  const merged = deepMerge(fileConfig, envConfig, overrides);

  try {
    const config = PatchflowConfigSchema.parse(merged);
    return { config, secrets: { apiKey: env.PATCHFLOW_API_KEY } };
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(
        `Final merged configuration is invalid:\n${err.issues
          .map((i) => `- ${i.path.join(".")}: ${i.message}`)
          .join("\n")}`
      );
    }
    throw err;
  }
}

function isObject(item: unknown): item is Record<string, unknown> {
  return !!item && typeof item === "object" && !Array.isArray(item);
}

/** Later sources win; `undefined` never overwrites a defined value. */
export function deepMerge(...sources: object[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      const targetValue = result[key];

      if (isObject(sourceValue) && isObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else if (isObject(sourceValue)) {
        result[key] = deepMerge(sourceValue);
      } else if (sourceValue !== undefined) {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}
