import type { PatchflowConfig } from "../config/schema.js";
import { errorMessage, WorkflowError } from "../core/errors.js";
import { countFindingTypes } from "../core/rules/rule-extractor.js";
import type { Finding, FindingTypeCounts, RagDocument, WorkflowWarning } from "../core/types/index.js";
import type { FixStageResult, FixTargetResult } from "./fix-stage.js";
import type { RescanOutcome } from "./rescan.js";
import type { ProcessingMode, StrategyResult } from "./strategies/index.js";

export type ReportStatus = "completed" | "failed";

export interface PerformanceMetrics {
  scan_duration: number;
  rag_duration: number;
  rag_prepare_duration?: number;
  fix_duration: number;
  rescan_duration?: number;
  total_duration: number;
  parallel_execution: boolean;
}

export interface WorkflowReport {
  status: ReportStatus;
  error?: { kind: string; message: string };
  warnings: WorkflowWarning[];
  timestamp: string;
  processing_mode: ProcessingMode;
  total_processing_time: number;
  configuration: PatchflowConfig;
  scan_results: readonly Finding[];
  rag_search_results: RagDocument[];
  fix_results: FixTargetResult[];
  rule_descriptions: string[];
  finding_counts: FindingTypeCounts;
  /** Findings left after the verification rescan, when one ran. */
  rescan?: { finding_counts: FindingTypeCounts; remaining_fixable: number };
  performance_metrics: PerformanceMetrics;
}

/** Milliseconds to seconds, rounded to the millisecond. */
export function toSeconds(ms: number): number {
  return Math.round(ms) / 1000;
}

export interface ReportInput {
  config: PatchflowConfig;
  mode: ProcessingMode;
  startedAt: Date;
  elapsedMs: number;
  strategy: StrategyResult;
  fix: FixStageResult;
  rescan?: RescanOutcome;
}

export function buildReport(input: ReportInput): WorkflowReport {
  const { strategy, fix, rescan } = input;
  const { timing } = strategy;
  const rescanMs = rescan?.durationMs;

  return {
    status: "completed",
    warnings: [...strategy.warnings, ...fix.warnings, ...(rescan?.warnings ?? [])],
    timestamp: input.startedAt.toISOString(),
    processing_mode: input.mode,
    total_processing_time: toSeconds(input.elapsedMs),
    configuration: input.config,
    scan_results: strategy.findings,
    rag_search_results: strategy.ragResults,
    fix_results: fix.results,
    rule_descriptions: [...strategy.ruleQuery.query],
    finding_counts: countFindingTypes(strategy.findings),
    ...(rescan?.summary && {
      rescan: {
        finding_counts: rescan.summary.findingCounts,
        remaining_fixable: rescan.summary.remainingFixable,
      },
    }),
    performance_metrics: {
      scan_duration: toSeconds(timing.scanMs),
      rag_duration: toSeconds(timing.ragSearchMs),
      ...(timing.ragPrepareMs !== undefined && { rag_prepare_duration: toSeconds(timing.ragPrepareMs) }),
      fix_duration: toSeconds(fix.durationMs),
      ...(rescanMs !== undefined && { rescan_duration: toSeconds(rescanMs) }),
      total_duration: toSeconds(timing.totalMs + fix.durationMs + (rescanMs ?? 0)),
      parallel_execution: timing.parallel,
    },
  };
}

export interface FailedReportInput {
  config: PatchflowConfig;
  mode: ProcessingMode;
  startedAt: Date;
  elapsedMs: number;
  error: unknown;
  /** Recoverable failures recorded before the fatal one. */
  warnings?: readonly WorkflowWarning[];
}

export function buildFailedReport(input: FailedReportInput): WorkflowReport {
  const kind = input.error instanceof WorkflowError ? input.error.kind : "UnexpectedError";
  const elapsed = toSeconds(input.elapsedMs);

  return {
    status: "failed",
    error: { kind, message: errorMessage(input.error) },
    warnings: [...(input.warnings ?? [])],
    timestamp: input.startedAt.toISOString(),
    processing_mode: input.mode,
    total_processing_time: elapsed,
    configuration: input.config,
    scan_results: [],
    rag_search_results: [],
    fix_results: [],
    rule_descriptions: [],
    finding_counts: { BUG: 0, CODE_SMELL: 0, VULNERABILITY: 0, TOTAL: 0 },
    performance_metrics: {
      scan_duration: 0,
      rag_duration: 0,
      fix_duration: 0,
      total_duration: elapsed,
      parallel_execution: input.mode === "parallel",
    },
  };
}
