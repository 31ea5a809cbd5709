import { stat } from "fs/promises";
import { resolve } from "path";

import type { PatchflowConfig } from "../config/schema.js";
import { ConfigurationError, WorkflowError } from "../core/errors.js";
import type { FixClient } from "../services/fix-client.js";
import type { ServiceCatalog } from "../services/registry.js";
import type { ScanClient } from "../services/scan-client.js";
import { logger, sanitizeError } from "../utils/logger.js";
import { runFixStage } from "./fix-stage.js";
import { buildFailedReport, buildReport, type WorkflowReport } from "./report.js";
import { runVerificationRescan } from "./rescan.js";
import {
  createDefaultStrategies,
  processingModeFor,
  selectStrategy,
  type StrategyRegistry,
} from "./strategies/index.js";

export interface WorkflowOrchestratorOptions {
  catalog: Pick<ServiceCatalog, "scanners" | "fixers" | "rag">;
  strategies?: StrategyRegistry;
  /** Base for a relative `projectPath`. */
  cwd?: string;
}

interface ResolvedRun {
  config: PatchflowConfig;
  scanner: ScanClient;
  fixer: FixClient;
}

/**
 * Runs one remediation pass: scan (with optional knowledge retrieval), then
 * fix, then an optional verification rescan. Always returns a report; fatal
 * errors become `status: "failed"`.
 */
export class WorkflowOrchestrator {
  private readonly strategies: StrategyRegistry;
  private readonly cwd: string;

  constructor(private readonly options: WorkflowOrchestratorOptions) {
    this.strategies = options.strategies ?? createDefaultStrategies();
    this.cwd = options.cwd ?? process.cwd();
  }

  async execute(config: PatchflowConfig): Promise<WorkflowReport> {
    const startedAt = new Date();
    const start = Date.now();
    const mode = processingModeFor(config);
    let runConfig = config;

    try {
      const run = await this.resolve(config);
      runConfig = run.config;
      const strategy = selectStrategy(this.strategies, mode);

      logger.info(`Scanning ${run.config.projectPath} with ${run.config.scanner} (${mode})`);
      const result = await strategy.run({
        config: run.config,
        scanner: run.scanner,
        rag: this.options.catalog.rag,
      });
      logger.info(
        `Found ${String(result.findings.length)} findings, ${String(result.ruleQuery.query.length)} distinct rules`
      );

      const fix = await runFixStage({
        findings: result.findings,
        projectPath: run.config.projectPath,
        mode: run.config.mode,
        fix: run.config.fix,
        ragResults: result.ragEnabled ? result.ragResults : [],
        fixer: run.fixer,
      });
      const rescan = await runVerificationRescan({ config: run.config, scanner: run.scanner, fix });

      return buildReport({
        config: run.config,
        mode,
        startedAt,
        elapsedMs: Date.now() - start,
        strategy: result,
        fix,
        rescan,
      });
    } catch (err) {
      logger.error(`Workflow failed: ${sanitizeError(err)}`);
      return buildFailedReport({
        config: runConfig,
        mode,
        startedAt,
        elapsedMs: Date.now() - start,
        error: err,
        warnings: err instanceof WorkflowError ? err.warnings : [],
      });
    }
  }

  /** Checks everything that can be checked before a service is called. */
  private async resolve(config: PatchflowConfig): Promise<ResolvedRun> {
    const projectPath = resolve(this.cwd, config.projectPath);

    let isDirectory = false;
    try {
      isDirectory = (await stat(projectPath)).isDirectory();
    } catch {
      throw new ConfigurationError(`Project path does not exist: ${projectPath}`);
    }
    if (!isDirectory) {
      throw new ConfigurationError(`Project path is not a directory: ${projectPath}`);
    }

    const scanner = this.options.catalog.scanners.resolve(config.scanner);
    const fixer = this.options.catalog.fixers.resolve(config.fixer);

    return { config: { ...config, projectPath }, scanner, fixer };
  }
}
