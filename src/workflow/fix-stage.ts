import pLimit from "p-limit";

import type { ExecutionMode, FixConfig } from "../config/schema.js";
import { errorMessage, FixFailure } from "../core/errors.js";
import { selectFixableFindings } from "../core/rules/rule-extractor.js";
import type { Finding, FixOutcome, FixTarget, RagDocument, WorkflowWarning } from "../core/types/index.js";
import type { FixClient } from "../services/fix-client.js";
import { logger } from "../utils/logger.js";

export const PROJECT_ROOT_TARGET = ".";

export interface FixTargetResult {
  target: string;
  fixed: boolean;
  findings: number;
  details?: Record<string, unknown>;
  error?: string;
}

export interface FixStageResult {
  results: FixTargetResult[];
  warnings: WorkflowWarning[];
  fixableCount: number;
  durationMs: number;
}

export interface FixStageInput {
  findings: readonly Finding[];
  projectPath: string;
  mode: ExecutionMode;
  fix: FixConfig;
  ragResults: readonly RagDocument[];
  fixer: FixClient;
}

/**
 * Groups findings by `file_path` in first-seen order. Findings without a path
 * go to the project root target.
 */
export function groupFixTargets(
  findings: readonly Finding[],
  projectPath: string,
  mode: ExecutionMode
): FixTarget[] {
  const groups = new Map<string, Finding[]>();
  for (const finding of findings) {
    const file = finding.file_path?.trim() || PROJECT_ROOT_TARGET;
    const group = groups.get(file);
    if (group) {
      group.push(finding);
    } else {
      groups.set(file, [finding]);
    }
  }
  return [...groups].map(([file, grouped]) => ({ file, projectPath, mode, findings: grouped }));
}

export async function runFixStage(input: FixStageInput): Promise<FixStageResult> {
  const startedAt = Date.now();
  const fixable = selectFixableFindings(input.findings);

  if (fixable.length === 0) {
    logger.info("No fixable findings, skipping fix stage");
    return { results: [], warnings: [], fixableCount: 0, durationMs: 0 };
  }

  const targets = groupFixTargets(fixable, input.projectPath, input.mode);
  const ragContext = input.ragResults.length > 0 ? input.ragResults : undefined;
  const limit = pLimit(input.fix.concurrency);
  let processed = 0;

  const results = await Promise.all(
    targets.map((target) =>
      limit(async (): Promise<FixTargetResult> => {
        try {
          const outcome: FixOutcome = await input.fixer.fix(target, input.fix.templateType, ragContext);
          return {
            target: target.file,
            fixed: outcome.fixed,
            findings: target.findings.length,
            details: outcome.details,
          };
        } catch (err) {
          logger.debug(`Fix for ${target.file} failed: ${errorMessage(err)}`, true);
          return {
            target: target.file,
            fixed: false,
            findings: target.findings.length,
            error: errorMessage(err),
          };
        } finally {
          processed++;
          logger.progress(`Fixing [${String(processed)}/${String(targets.length)}]...`);
        }
      })
    )
  );

  const warnings = results
    .filter((result) => !result.fixed)
    .map((result) => {
      const failure = new FixFailure(
        result.error ? `Fix failed: ${result.error}` : "Fixer reported no changes",
        result.target
      );
      return { kind: failure.kind, message: failure.message, target: failure.target };
    });

  return {
    results,
    warnings,
    fixableCount: fixable.length,
    durationMs: Date.now() - startedAt,
  };
}
