import type { PatchflowConfig } from "../config/schema.js";
import { errorMessage } from "../core/errors.js";
import { countFindingTypes, selectFixableFindings } from "../core/rules/rule-extractor.js";
import type { FindingTypeCounts, WorkflowWarning } from "../core/types/index.js";
import type { ScanClient } from "../services/scan-client.js";
import { logger } from "../utils/logger.js";
import type { FixStageResult } from "./fix-stage.js";
import { scanProject } from "./strategies/shared.js";

export interface RescanSummary {
  findingCounts: FindingTypeCounts;
  remainingFixable: number;
}

export interface RescanOutcome {
  /** Absent when the rescan was skipped or failed. */
  summary?: RescanSummary;
  warnings: WorkflowWarning[];
  /** Undefined when no rescan call was made. */
  durationMs?: number;
}

export interface RescanInput {
  config: PatchflowConfig;
  scanner: ScanClient;
  fix: FixStageResult;
}

/**
 * Scans the project once more after fixes were applied. Runs only when
 * `config.rescan` is set and at least one target was fixed; never throws.
 */
export async function runVerificationRescan(input: RescanInput): Promise<RescanOutcome> {
  if (!input.config.rescan) {
    return { warnings: [] };
  }
  if (!input.fix.results.some((result) => result.fixed)) {
    logger.debug("No target was fixed, skipping verification rescan");
    return { warnings: [] };
  }

  const startedAt = Date.now();
  try {
    const scan = await scanProject({ config: input.config, scanner: input.scanner });
    const summary: RescanSummary = {
      findingCounts: countFindingTypes(scan.findings),
      remainingFixable: selectFixableFindings(scan.findings).length,
    };
    logger.info(
      `Rescan found ${String(summary.findingCounts.TOTAL)} findings, ${String(summary.remainingFixable)} still fixable`
    );
    return { summary, warnings: [], durationMs: Date.now() - startedAt };
  } catch (err) {
    const message = `Verification rescan failed: ${errorMessage(err)}`;
    logger.warn(message);
    return { warnings: [{ kind: "ScanFailure", message }], durationMs: Date.now() - startedAt };
  }
}
