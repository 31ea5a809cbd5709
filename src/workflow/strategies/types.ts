import type { PatchflowConfig } from "../../config/schema.js";
import type { Finding, RagDocument, RuleQuery, WorkflowWarning } from "../../core/types/index.js";
import type { RagClient } from "../../services/rag-client.js";
import type { ScanClient } from "../../services/scan-client.js";

export type ProcessingMode = "sequential" | "parallel";

export interface StrategyContext {
  config: PatchflowConfig;
  scanner: ScanClient;
  rag: RagClient;
}

/** Phase durations in milliseconds. */
export interface StrategyTiming {
  scanMs: number;
  ragPrepareMs?: number;
  ragSearchMs: number;
  totalMs: number;
  parallel: boolean;
}

export interface StrategyResult {
  findings: readonly Finding[];
  scanStatus: string;
  ruleQuery: RuleQuery;
  /** False when RAG was off from the start or switched off after a failure. */
  ragEnabled: boolean;
  ragResults: RagDocument[];
  warnings: WorkflowWarning[];
  timing: StrategyTiming;
}

export interface ExecutionStrategy {
  readonly name: ProcessingMode;
  run(context: StrategyContext): Promise<StrategyResult>;
}
