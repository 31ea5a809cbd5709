import chalk from "chalk";

import { redactText, redactObject, SENSITIVE_NAMES, safeTruncate } from "./redaction.js";
import { sanitizeForTerminal } from "./terminal-sanitize.js";
export { redactText, redactObject, SENSITIVE_NAMES, safeTruncate };

/**
 * Formats an error for a log line: secrets redacted, terminal escapes
 * removed, causes appended. Stack traces only when verbose.
 */
export function sanitizeError(err: unknown, verbose = false): string {
  if (err instanceof Error) {
    let result = sanitizeForTerminal(redactText(err.message));

    if (verbose && err.stack) {
      result += `\n${sanitizeForTerminal(redactText(err.stack))}`;
    }

    if (err.cause) {
      result += `\n[Cause]: ${sanitizeError(err.cause, verbose)}`;
    }

    return result;
  }
  return sanitizeForTerminal(redactText(String(err)));
}

function isVerbose(verbose?: boolean): boolean {
  return verbose ?? process.argv.includes("--verbose");
}

/**
 * CLI logger. Everything except `output` goes to stderr so that reports
 * printed with `--json` can be piped.
 */
export const logger = {
  info: (msg: string) => {
    console.error(chalk.blue(`[INFO] ${redactText(msg)}`));
  },
  warn: (msg: string) => {
    console.error(chalk.yellow(`[WARN] ${redactText(msg)}`));
  },
  error: (msg: string | Error, verbose?: boolean) => {
    if (msg instanceof Error) {
      console.error(chalk.red(`[ERROR] ${sanitizeError(msg, isVerbose(verbose))}`));
    } else {
      console.error(chalk.red(`[ERROR] ${redactText(msg)}`));
    }
  },
  debug: (msg: string, verbose?: boolean) => {
    if (isVerbose(verbose)) console.error(chalk.gray(`[DEBUG] ${redactText(msg)}`));
  },
  success: (msg: string) => {
    console.error(chalk.green(`[SUCCESS] ${redactText(msg)}`));
  },
  progress: (msg: string) => {
    console.error(chalk.cyan(redactText(msg)));
  },
  plain: (msg: string) => {
    console.error(redactText(msg));
  },
  output: (msg: string) => {
    console.log(redactText(msg));
  },
};
