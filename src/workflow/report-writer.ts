import { format } from "date-fns";
import { readdir, unlink } from "fs/promises";
import { isAbsolute, join, resolve } from "path";

import type { OutputConfig } from "../config/schema.js";
import { logger, redactObject, sanitizeError } from "../utils/logger.js";
import { writeFileAtomicNoFollow } from "../utils/safe-write.js";
import type { WorkflowReport } from "./report.js";

const REPORT_PREFIX = "report-";
const REPORT_SUFFIX = ".json";

export function reportFileName(date: Date): string {
  return `${REPORT_PREFIX}${format(date, "yyyyMMdd-HHmmss")}${REPORT_SUFFIX}`;
}

export function resolveResultsDir(output: Pick<OutputConfig, "resultsDir">, cwd: string): string {
  return isAbsolute(output.resultsDir) ? output.resultsDir : resolve(cwd, output.resultsDir);
}

/** Writes the report, redacted, and prunes older ones. Returns the written path. */
export async function saveReport(
  report: WorkflowReport,
  output: Pick<OutputConfig, "resultsDir" | "keepReports">,
  cwd: string = process.cwd(),
  now: Date = new Date()
): Promise<string> {
  const dir = resolveResultsDir(output, cwd);
  const path = join(dir, reportFileName(now));
  await writeFileAtomicNoFollow(path, `${JSON.stringify(redactObject(report), null, 2)}\n`);
  await pruneReports(dir, output.keepReports);
  return path;
}

/** Keeps the `limit` newest reports; names sort chronologically. */
export async function pruneReports(dir: string, limit: number): Promise<string[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    logger.warn(`Invalid keepReports limit (${String(limit)}), skipping pruning`);
    return [];
  }

  const removed: string[] = [];
  try {
    const files = await readdir(dir);
    const reports = files
      .filter((f) => f.startsWith(REPORT_PREFIX) && f.endsWith(REPORT_SUFFIX))
      .sort()
      .reverse();

    for (const file of reports.slice(limit)) {
      await unlink(join(dir, file));
      removed.push(file);
    }
  } catch (err) {
    logger.warn(`Failed to prune old reports: ${sanitizeError(err)}`);
  }
  return removed;
}
