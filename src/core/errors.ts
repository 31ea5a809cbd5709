import type { WorkflowWarning } from "./types/index.js";

export interface WorkflowErrorOptions {
  cause?: unknown;
  /** Recoverable failures from the same run that happened before this one. */
  warnings?: readonly WorkflowWarning[];
}

/**
 * Errors raised inside a workflow run. The orchestrator turns fatal ones into
 * a failed report and records recoverable ones as warnings, keyed by `name`.
 */
export class WorkflowError extends Error {
  readonly warnings: readonly WorkflowWarning[];

  constructor(
    message: string,
    public readonly fatal: boolean,
    options: WorkflowErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "WorkflowError";
    this.warnings = options.warnings ?? [];
  }

  get kind(): string {
    return this.name;
  }
}

/** Invalid project path or unknown scanner/fixer. Raised before any service call. */
export class ConfigurationError extends WorkflowError {
  constructor(message: string) {
    super(message, true);
    this.name = "ConfigurationError";
  }
}

export class ScanFailure extends WorkflowError {
  constructor(
    message: string,
    public readonly scanner: string,
    options?: WorkflowErrorOptions
  ) {
    super(message, true, options);
    this.name = "ScanFailure";
  }
}

/** Recovered locally: RAG is switched off for the rest of the run. */
export class RagFailure extends WorkflowError {
  constructor(
    message: string,
    public readonly phase: "prepare" | "search",
    options?: WorkflowErrorOptions
  ) {
    super(message, false, options);
    this.name = "RagFailure";
  }
}

/** A supervised unit outlived the parallel deadline. Fatal only for the scan unit. */
export class TimeoutExceeded extends WorkflowError {
  constructor(
    public readonly unit: string,
    public readonly timeoutMs: number,
    fatal = false,
    options?: WorkflowErrorOptions
  ) {
    super(`${unit} did not finish within ${formatSeconds(timeoutMs)}`, fatal, options);
    this.name = "TimeoutExceeded";
  }
}

/** One fix target failed; the run still completes. */
export class FixFailure extends WorkflowError {
  constructor(
    message: string,
    public readonly target: string,
    options?: WorkflowErrorOptions
  ) {
    super(message, false, options);
    this.name = "FixFailure";
  }
}

function formatSeconds(ms: number): string {
  return `${String(ms / 1000)}s`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
