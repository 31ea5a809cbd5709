import { Command, Option } from "commander";

import { loadConfig, type LoadedConfig } from "../../config/loader.js";
import { logger } from "../../utils/logger.js";

interface ConfigOptions {
  json: boolean;
  resolvedConfig?: LoadedConfig;
}

export function createConfigCommand(): Command {
  return new Command("config")
    .description("Display resolved configuration")
    .addOption(new Option("--resolved-config").hideHelp())
    .option("--json", "Output as JSON")
    .action(async (options: ConfigOptions) => {
      const { config, secrets } = options.resolvedConfig ?? (await loadConfig());

      if (options.json) {
        logger.output(JSON.stringify(config, null, 2));
      } else {
        logger.plain("Patchflow Configuration:");
        logger.plain("========================");
        logger.plain(`Project Path: ${config.projectPath}`);
        logger.plain(`Scanner: ${config.scanner}`);
        logger.plain(`Fixer: ${config.fixer} (${config.mode})`);
        logger.plain(
          `Parallel: ${String(config.parallel)} (timeout ${String(config.parallelTimeoutSeconds)}s)`
        );
        logger.plain(`Rescan: ${String(config.rescan)}`);
        logger.plain("");
        logger.plain("Knowledge Retrieval:");
        logger.plain(`  Enabled: ${String(config.rag.enabled)}`);
        logger.plain(`  Limit: ${String(config.rag.limit)}`);
        logger.plain(`  Combine Mode: ${config.rag.combineMode}`);
        logger.plain(`  Collection: ${config.rag.collection}`);
        logger.plain("");
        logger.plain("Fix:");
        logger.plain(`  Template: ${config.fix.templateType}`);
        logger.plain(`  Concurrency: ${String(config.fix.concurrency)}`);
        logger.plain("");
        logger.plain("Services:");
        logger.plain(`  Scan: ${config.services.scan.baseUrl} (${String(config.services.scan.timeoutMs)}ms)`);
        logger.plain(`  Fix: ${config.services.fix.baseUrl} (${String(config.services.fix.timeoutMs)}ms)`);
        logger.plain(`  Knowledge: ${config.services.rag.baseUrl} (${String(config.services.rag.timeoutMs)}ms)`);
        logger.plain(`  Max Retries: ${String(config.services.maxRetries)}`);
        logger.plain(`  API Key: ${secrets.apiKey ? "set" : "not set"}`);
        logger.plain("");
        logger.plain("Output:");
        logger.plain(`  Results Dir: ${config.output.resultsDir}`);
        logger.plain(`  Keep Reports: ${String(config.output.keepReports)}`);
        logger.plain(`  Save: ${String(config.output.save)}`);
      }
    });
}

export const configCommand = createConfigCommand();
