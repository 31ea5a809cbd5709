import { z } from "zod";

import type { CombineMode, ExecutionMode } from "../../config/schema.js";

/**
 * One scan result item. Scanner-specific fields pass through untouched.
 */
export const FindingSchema = z.looseObject({
  classification: z.string().nullish(),
  action: z.string().nullish(),
  rule_description: z.string().nullish(),
  file_path: z.string().nullish(),
  line: z.number().int().nullish(),
  type: z.string().nullish(),
  severity: z.string().nullish(),
});

export type Finding = Readonly<z.infer<typeof FindingSchema>>;

export interface RuleQuery {
  readonly query: readonly string[];
  readonly limit: number;
  readonly combineMode: CombineMode;
}

export const RagDocumentSchema = z.looseObject({
  content: z.string().default(""),
  metadata: z.record(z.string(), z.unknown()).optional(),
  similarity_score: z.number().optional(),
});

export type RagDocument = z.infer<typeof RagDocumentSchema>;

export interface ScanResult {
  status: string;
  findings: readonly Finding[];
  message?: string;
}

export interface RagPreparation {
  ready: boolean;
  collection: string;
}

/** A file (or the project root, ".") handed to the fixer with its findings. */
export interface FixTarget {
  file: string;
  projectPath: string;
  mode: ExecutionMode;
  findings: readonly Finding[];
}

export interface FixOutcome {
  fixed: boolean;
  details: Record<string, unknown>;
}

export interface WorkflowWarning {
  kind: string;
  message: string;
  target?: string;
}

export type FindingTypeCounts = Record<string, number> & { TOTAL: number };
