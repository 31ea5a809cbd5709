import chalk from "chalk";
import { Command, Option } from "commander";

import { loadConfig, type DeepPartial, type LoadedConfig } from "../../config/loader.js";
import {
  ExecutionModeSchema,
  TemplateTypeSchema,
  type ExecutionMode,
  type PatchflowConfig,
  type TemplateType,
} from "../../config/schema.js";
import { createServiceCatalog } from "../../services/registry.js";
import { logger, sanitizeError } from "../../utils/logger.js";
import { WorkflowOrchestrator } from "../../workflow/orchestrator.js";
import type { WorkflowReport } from "../../workflow/report.js";
import { saveReport } from "../../workflow/report-writer.js";
import { applyCliOverrides } from "../config-resolver.js";
import { CliRuntimeError, CliUsageError } from "../errors.js";

export interface RunOptions {
  scanner?: string;
  fixer?: string;
  mode?: ExecutionMode;
  rag?: boolean;
  parallel?: boolean;
  timeout?: number;
  template?: TemplateType;
  rescan?: boolean;
  save: boolean;
  json?: boolean;
  resolvedConfig?: LoadedConfig;
}

function parseTimeout(val: string): number {
  const parsed = Number(val);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new CliUsageError(`--timeout must be a positive number of seconds, got: "${val}"`);
  }
  return parsed;
}

export function buildRunOverrides(
  project: string | undefined,
  options: RunOptions,
  saveFromCli: boolean
): DeepPartial<PatchflowConfig> {
  return {
    projectPath: project,
    scanner: options.scanner,
    fixer: options.fixer,
    mode: options.mode,
    parallel: options.parallel,
    parallelTimeoutSeconds: options.timeout,
    rescan: options.rescan,
    rag: { enabled: options.rag },
    fix: { templateType: options.template },
    output: { save: saveFromCli ? options.save : undefined },
  };
}

export function formatSummary(report: WorkflowReport): string[] {
  const metrics = report.performance_metrics;
  const lines = [
    `Status: ${report.status === "completed" ? chalk.green(report.status) : chalk.red(report.status)}`,
    `Mode: ${report.processing_mode}`,
    `Findings: ${String(report.finding_counts.TOTAL)} (bugs ${String(report.finding_counts.BUG)}, code smells ${String(report.finding_counts.CODE_SMELL)}, vulnerabilities ${String(report.finding_counts.VULNERABILITY)})`,
    `Rules searched: ${String(report.rule_descriptions.length)}`,
    `Knowledge documents: ${String(report.rag_search_results.length)}`,
    `Fix targets: ${String(report.fix_results.filter((r) => r.fixed).length)}/${String(report.fix_results.length)} fixed`,
    `Timing: scan ${String(metrics.scan_duration)}s, rag ${String(metrics.rag_duration)}s, fix ${String(metrics.fix_duration)}s, total ${String(metrics.total_duration)}s`,
  ];
  if (report.rescan) {
    lines.push(
      `Rescan: ${String(report.rescan.finding_counts.TOTAL)} findings remain, ${String(report.rescan.remaining_fixable)} fixable`
    );
  }
  if (report.error) {
    lines.push(`Error (${report.error.kind}): ${report.error.message}`);
  }
  for (const warning of report.warnings) {
    lines.push(chalk.yellow(`Warning (${warning.kind})${warning.target ? ` ${warning.target}` : ""}: ${warning.message}`));
  }
  return lines;
}

async function runAction(project: string | undefined, options: RunOptions, command: Command): Promise<void> {
  const loaded =
    options.resolvedConfig ?? (await loadConfig(process.cwd(), {}, { verbose: process.argv.includes("--verbose") }));

  const saveFromCli = command.getOptionValueSource("save") === "cli";
  const config = applyCliOverrides(loaded.config, buildRunOverrides(project, options, saveFromCli));

  const catalog = createServiceCatalog(config, loaded.secrets);
  const orchestrator = new WorkflowOrchestrator({ catalog });
  const report = await orchestrator.execute(config);

  if (config.output.save) {
    try {
      const path = await saveReport(report, config.output);
      logger.success(`Report written to: ${chalk.cyan(path)}`);
    } catch (err) {
      throw new CliRuntimeError(`Failed to save report: ${sanitizeError(err)}`, err);
    }
  }

  if (options.json) {
    logger.output(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatSummary(report)) logger.plain(line);
  }

  if (report.status === "failed") {
    process.exitCode = 1;
  }
}

export function createRunCommand(): Command {
  return new Command("run")
    .description("Scan a project, retrieve fix knowledge and apply fixes")
    .argument("[project]", "Project directory to remediate (defaults to config projectPath)")
    .option("--scanner <id>", "Scanner identifier")
    .option("--fixer <id>", "Fixer identifier")
    .addOption(new Option("--mode <mode>", "Fixer execution mode").choices(ExecutionModeSchema.options))
    .option("--rag", "Enable knowledge retrieval")
    .option("--parallel", "Run the scan and knowledge preparation concurrently")
    .option("--timeout <seconds>", "Deadline for the parallel phase", parseTimeout)
    .addOption(new Option("--template <type>", "Fix prompt template").choices(TemplateTypeSchema.options))
    .option("--rescan", "Scan once more after fixes are applied")
    .option("--no-save", "Do not write the report to the results directory")
    .option("--json", "Print the report as JSON")
    .addOption(new Option("--resolved-config").hideHelp())
    .action(runAction);
}

export const runCommand = createRunCommand();
