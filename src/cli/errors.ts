import { ServiceHttpError } from "../core/http.js";
import { WorkflowError } from "../core/errors.js";
import { redactText } from "../utils/logger.js";
import { sanitizeForTerminal } from "../utils/terminal-sanitize.js";

const DEBUG_ACK = "I_UNDERSTAND_SECURITY_RISK";
const MAX_CAUSE_DEPTH = 5;

function sanitize(text: string): string {
  return sanitizeForTerminal(redactText(text));
}

export class CliError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliError";
  }
}

/** Bad flags or config. Shown as-is, without diagnostics. */
export class CliUsageError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Diagnostics (cause chain and stacks) are on when requested or when
 * PATCHFLOW_DEBUG_DIAGNOSTICS=1. In production they also need
 * PATCHFLOW_DEBUG_DIAGNOSTICS_ACK.
 */
export function diagnosticsEnabled(requested?: boolean): boolean {
  const acknowledged = process.env.PATCHFLOW_DEBUG_DIAGNOSTICS_ACK === DEBUG_ACK;
  const wanted = requested ?? process.env.PATCHFLOW_DEBUG_DIAGNOSTICS === "1";
  if (process.env.NODE_ENV === "production") {
    return wanted && acknowledged;
  }
  return wanted;
}

function causeChain(error: unknown): Error[] {
  const chain: Error[] = [];
  let current = error;
  while (current instanceof Error && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}

function describe(error: Error): string {
  if (error instanceof ServiceHttpError) {
    const status = error.status === undefined ? "no response" : `HTTP ${String(error.status)}`;
    return `${error.service} service (${status}): ${error.message}`;
  }
  if (error instanceof WorkflowError) {
    return `${error.kind}: ${error.message}`;
  }
  return error.message;
}

/** A failure while running a command, wrapping whatever caused it. */
export class CliRuntimeError extends CliError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message, { cause: originalError });
    this.name = "CliRuntimeError";
  }

  /** The most specific known error kind in the cause chain. */
  get code(): string {
    for (const error of causeChain(this.originalError)) {
      if (error instanceof WorkflowError) return error.kind;
      if (error instanceof ServiceHttpError) {
        const suffix = error.status === undefined ? "unreachable" : String(error.status);
        return `${error.service}-${suffix}`;
      }
    }
    return this.name;
  }

  /**
   * Message for the terminal, always redacted. Production output without
   * diagnostics is reduced to the message and error code.
   */
  toPublicString(options: { debug?: boolean } = {}): string {
    const debug = diagnosticsEnabled(options.debug);
    const message = sanitize(this.message);

    if (!debug) {
      return process.env.NODE_ENV === "production" ? `${message} [Error Code: ${this.code}]` : message;
    }

    const lines = [message];
    const causes = causeChain(this.originalError);
    for (const cause of causes) {
      lines.push(`Caused by: ${sanitize(describe(cause))}`);
    }
    const innermost = causes[causes.length - 1] ?? this;
    if (innermost.stack) {
      lines.push(sanitize(innermost.stack));
    }
    return lines.join("\n");
  }
}

/** Wraps anything thrown out of a command so it prints safely. */
export function toCliRuntimeError(error: unknown): CliRuntimeError {
  if (error instanceof CliRuntimeError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CliRuntimeError(message, error);
}
