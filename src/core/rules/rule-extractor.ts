import { DEFAULT_RAG_LIMIT, type CombineMode } from "../../config/schema.js";
import type { Finding, FindingTypeCounts, RuleQuery } from "../types/index.js";

export interface ExtractOptions {
  limit?: number;
  combineMode?: CombineMode;
}

function matches(value: string | null | undefined, expected: string): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === expected;
}

/**
 * Findings the fixer should act on: classified "True Bug" with action "Fix",
 * compared case-insensitively.
 */
export function selectFixableFindings(findings: readonly Finding[]): Finding[] {
  return findings
    .filter((finding) => matches(finding.classification, "true bug"))
    .filter((finding) => matches(finding.action, "fix"));
}

/**
 * Builds the knowledge-base query for a batch of findings.
 *
 * Keeps fixable findings, drops blank rule descriptions and removes exact
 * duplicates. First-seen order is preserved.
 */
export function extractRuleQuery(
  findings: readonly Finding[],
  options: ExtractOptions = {}
): RuleQuery {
  const seen = new Set<string>();
  const query: string[] = [];

  for (const finding of selectFixableFindings(findings)) {
    const description = finding.rule_description;
    if (typeof description !== "string" || description.trim() === "") continue;
    if (seen.has(description)) continue;
    seen.add(description);
    query.push(description);
  }

  return Object.freeze({
    query: Object.freeze(query),
    limit: options.limit ?? DEFAULT_RAG_LIMIT,
    combineMode: options.combineMode ?? "OR",
  });
}

export function countFindingTypes(findings: readonly Finding[]): FindingTypeCounts {
  const counts: FindingTypeCounts = { BUG: 0, CODE_SMELL: 0, VULNERABILITY: 0, TOTAL: 0 };
  for (const finding of findings) {
    const type = (finding.type ?? "UNKNOWN").toUpperCase();
    counts[type] = (counts[type] ?? 0) + 1;
    counts.TOTAL += 1;
  }
  return counts;
}
