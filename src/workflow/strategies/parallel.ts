import { errorMessage, RagFailure, ScanFailure, TimeoutExceeded } from "../../core/errors.js";
import { JobSupervisor, type WorkHandle, type WorkOutcome } from "../../core/supervisor/job-supervisor.js";
import type { RagPreparation, ScanResult, WorkflowWarning } from "../../core/types/index.js";
import { logger } from "../../utils/logger.js";
import { buildRuleQuery, ragWarning, scanProject, searchKnowledge } from "./shared.js";
import type { ExecutionStrategy, StrategyContext, StrategyResult } from "./types.js";

export interface ParallelStrategyOptions {
  createSupervisor?: () => JobSupervisor;
}

function outcomeOf<T>(handle: WorkHandle<T>): WorkOutcome<T> {
  return handle.outcome ?? { state: "timed_out", durationMs: 0 };
}

/**
 * Runs the scan and knowledge-base preparation side by side under one
 * deadline, then searches with the query extracted from the scan.
 */
export class ParallelStrategy implements ExecutionStrategy {
  readonly name = "parallel" as const;
  private readonly createSupervisor: () => JobSupervisor;

  constructor(options: ParallelStrategyOptions = {}) {
    this.createSupervisor = options.createSupervisor ?? (() => new JobSupervisor());
  }

  async run(context: StrategyContext): Promise<StrategyResult> {
    const { config } = context;
    const timeoutMs = config.parallelTimeoutSeconds * 1000;
    const supervisor = this.createSupervisor();

    try {
      const scanHandle = supervisor.submit<ScanResult>("scan", (signal) => scanProject(context, signal));
      const prepareHandle = config.rag.enabled
        ? supervisor.submit<RagPreparation>("rag-prepare", (signal) =>
            context.rag.prepare(config.projectPath, signal)
          )
        : undefined;

      await supervisor.awaitAll(prepareHandle ? [scanHandle, prepareHandle] : [scanHandle], timeoutMs);

      const warnings: WorkflowWarning[] = [];
      let ragEnabled = config.rag.enabled;
      let ragPrepareMs: number | undefined;

      if (prepareHandle) {
        const prepareOutcome = outcomeOf(prepareHandle);
        ragPrepareMs = prepareOutcome.durationMs;
        const failure = preparationFailure(prepareOutcome, timeoutMs);
        if (failure) {
          logger.warn(`${failure.message}. Continuing without retrieval context.`);
          warnings.push(ragWarning(failure));
          ragEnabled = false;
        }
      }

      const scanOutcome = outcomeOf(scanHandle);
      if (scanOutcome.state === "timed_out") {
        throw new TimeoutExceeded("scan", timeoutMs, true, { warnings });
      }
      if (scanOutcome.state === "failed") {
        throw scanFailure(scanOutcome.error, config.scanner, warnings);
      }
      const scan = scanOutcome.value;

      const ruleQuery = buildRuleQuery(context, scan);
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

      const scanMs = scanOutcome.durationMs;
      return {
        findings: scan.findings,
        scanStatus: scan.status,
        ruleQuery,
        ragEnabled,
        ragResults,
        warnings,
        timing: {
          scanMs,
          ...(ragPrepareMs !== undefined && { ragPrepareMs }),
          ragSearchMs,
          totalMs: Math.max(scanMs, ragPrepareMs ?? 0) + ragSearchMs,
          parallel: true,
        },
      };
    } finally {
      supervisor.dispose();
    }
  }
}

function scanFailure(error: unknown, scanner: string, warnings: WorkflowWarning[]): ScanFailure {
  if (error instanceof ScanFailure) {
    return new ScanFailure(error.message, error.scanner, { cause: error.cause, warnings });
  }
  return new ScanFailure(`Scan failed: ${errorMessage(error)}`, scanner, { cause: error, warnings });
}

function preparationFailure(outcome: WorkOutcome<RagPreparation>, timeoutMs: number): RagFailure | undefined {
  switch (outcome.state) {
    case "timed_out": {
      const timeout = new TimeoutExceeded("rag-prepare", timeoutMs);
      return new RagFailure(`Knowledge preparation failed: ${timeout.message}`, "prepare", { cause: timeout });
    }
    case "failed":
      return new RagFailure(`Knowledge preparation failed: ${errorMessage(outcome.error)}`, "prepare", {
        cause: outcome.error,
      });
    case "completed":
      return outcome.value.ready
        ? undefined
        : new RagFailure("Knowledge preparation failed: collection is not ready", "prepare");
  }
}
