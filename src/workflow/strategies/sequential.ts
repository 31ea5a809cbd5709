import type { WorkflowWarning } from "../../core/types/index.js";
import { buildRuleQuery, ragWarning, scanProject, searchKnowledge } from "./shared.js";
import type { ExecutionStrategy, StrategyContext, StrategyResult } from "./types.js";

/** Scan, then search. One phase at a time. */
export class SequentialStrategy implements ExecutionStrategy {
  readonly name = "sequential" as const;

  async run(context: StrategyContext): Promise<StrategyResult> {
    const scanStart = Date.now();
    const scan = await scanProject(context);
    const scanMs = Date.now() - scanStart;

    const ruleQuery = buildRuleQuery(context, scan);
    const warnings: WorkflowWarning[] = [];
    let ragEnabled = context.config.rag.enabled;
    let ragResults: StrategyResult["ragResults"] = [];
    let ragSearchMs = 0;

    if (ragEnabled) {
      const searchStart = Date.now();
      const search = await searchKnowledge(context, ruleQuery);
      ragSearchMs = Date.now() - searchStart;
      ragResults = search.documents;
      if (search.failure) {
        warnings.push(ragWarning(search.failure));
        ragEnabled = false;
      }
    }

    return {
      findings: scan.findings,
      scanStatus: scan.status,
      ruleQuery,
      ragEnabled,
      ragResults,
      warnings,
      timing: { scanMs, ragSearchMs, totalMs: scanMs + ragSearchMs, parallel: false },
    };
  }
}
