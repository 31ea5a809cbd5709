import { errorMessage, RagFailure, ScanFailure } from "../../core/errors.js";
import { extractRuleQuery } from "../../core/rules/rule-extractor.js";
import type { RagDocument, RuleQuery, ScanResult, WorkflowWarning } from "../../core/types/index.js";
import { logger } from "../../utils/logger.js";
import type { StrategyContext } from "./types.js";

export async function scanProject(
  context: Pick<StrategyContext, "config" | "scanner">,
  signal?: AbortSignal
): Promise<ScanResult> {
  const { projectPath, scanner } = context.config;
  let result: ScanResult;
  try {
    result = await context.scanner.scan(projectPath, scanner, signal);
  } catch (err) {
    throw new ScanFailure(`Scan with ${scanner} failed: ${errorMessage(err)}`, scanner, { cause: err });
  }
  if (result.status !== "success") {
    throw new ScanFailure(
      `Scan with ${scanner} returned status "${result.status}"${result.message ? `: ${result.message}` : ""}`,
      scanner
    );
  }
  logger.debug(`Scan returned ${String(result.findings.length)} findings`);
  return result;
}

export function buildRuleQuery(context: StrategyContext, scan: ScanResult): RuleQuery {
  return extractRuleQuery(scan.findings, {
    limit: context.config.rag.limit,
    combineMode: context.config.rag.combineMode,
  });
}

export function ragWarning(failure: RagFailure): WorkflowWarning {
  return { kind: failure.kind, message: failure.message };
}

export interface SearchOutcome {
  documents: RagDocument[];
  failure?: RagFailure;
}

/** An empty query skips the call entirely. Failures come back, never throw. */
export async function searchKnowledge(context: StrategyContext, query: RuleQuery): Promise<SearchOutcome> {
  if (query.query.length === 0) {
    logger.debug("No rule descriptions to search for, skipping knowledge search");
    return { documents: [] };
  }
  try {
    const documents = await context.rag.search(query);
    logger.debug(`Knowledge search returned ${String(documents.length)} documents`);
    return { documents };
  } catch (err) {
    const failure = new RagFailure(`Knowledge search failed: ${errorMessage(err)}`, "search", { cause: err });
    logger.warn(`${failure.message}. Continuing without retrieval context.`);
    return { documents: [], failure };
  }
}
