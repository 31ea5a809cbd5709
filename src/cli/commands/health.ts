import chalk from "chalk";
import { Command, Option } from "commander";

import { loadConfig, type LoadedConfig } from "../../config/loader.js";
import { checkServices } from "../../services/health.js";
import { createHttpServices } from "../../services/registry.js";
import { logger } from "../../utils/logger.js";

interface HealthOptions {
  json?: boolean;
  resolvedConfig?: LoadedConfig;
}

export function createHealthCommand(): Command {
  return new Command("health")
    .description("Check that the scan, fix and knowledge services are reachable")
    .option("--json", "Output as JSON")
    .addOption(new Option("--resolved-config").hideHelp())
    .action(async (options: HealthOptions) => {
      const { config, secrets } = options.resolvedConfig ?? (await loadConfig());
      const services = createHttpServices(config, secrets);
      const results = await checkServices([services.scan, services.fix, services.rag]);

      if (options.json) {
        logger.output(JSON.stringify(results, null, 2));
      } else {
        for (const result of results) {
          const status = result.healthy ? chalk.green("up") : chalk.red("down");
          logger.plain(`${result.name.padEnd(5)} ${status}  ${result.url} (${String(result.latencyMs)}ms)`);
        }
      }

      if (results.some((result) => !result.healthy)) {
        process.exitCode = 1;
      }
    });
}

export const healthCommand = createHealthCommand();
