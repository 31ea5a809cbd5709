/**
 * Canonical list of the environment variables patchflow reads.
 *
 * Kept in step with PatchflowEnvSchema and .env.example by the config tests.
 */
export const ENV_VAR_NAMES = {
  NODE_ENV: "NODE_ENV",

  // Service endpoints
  PATCHFLOW_SCAN_URL: "PATCHFLOW_SCAN_URL",
  PATCHFLOW_FIX_URL: "PATCHFLOW_FIX_URL",
  PATCHFLOW_RAG_URL: "PATCHFLOW_RAG_URL",
  PATCHFLOW_API_KEY: "PATCHFLOW_API_KEY",

  // Workflow
  PATCHFLOW_PARALLEL_TIMEOUT: "PATCHFLOW_PARALLEL_TIMEOUT",

  // Dotenv control
  PATCHFLOW_LOAD_DOTENV: "PATCHFLOW_LOAD_DOTENV",
  PATCHFLOW_DOTENV_OVERRIDE: "PATCHFLOW_DOTENV_OVERRIDE",
  PATCHFLOW_DOTENV_OVERRIDE_ACK: "PATCHFLOW_DOTENV_OVERRIDE_ACK",
  PATCHFLOW_DOTENV_PATH: "PATCHFLOW_DOTENV_PATH",

  PATCHFLOW_STRICT_CONFIG: "PATCHFLOW_STRICT_CONFIG",

  PATCHFLOW_DEBUG_DIAGNOSTICS: "PATCHFLOW_DEBUG_DIAGNOSTICS",
  PATCHFLOW_DEBUG_DIAGNOSTICS_ACK: "PATCHFLOW_DEBUG_DIAGNOSTICS_ACK",
} as const;

export const ALL_ENV_VARS = Object.values(ENV_VAR_NAMES);
