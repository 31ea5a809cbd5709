#!/usr/bin/env node

import { Command } from "commander";

import { configCommand } from "./commands/config.js";
import { healthCommand } from "./commands/health.js";
import { runCommand } from "./commands/run.js";
import { resolveCliConfig } from "./config-resolver.js";

import { logger } from "../utils/logger.js";
import { CliUsageError, toCliRuntimeError } from "./errors.js";

const program = new Command();

program
  .name("patchflow")
  .description("Scan, retrieve and fix: a code remediation workflow runner")
  .version("0.1.0")
  .option("-v, --verbose", "Enable verbose logging")
  .option("-c, --config <path>", "Path to config file")
  .option("--strict-config", "Fail on malformed or invalid config files")
  .hook("preAction", async (thisCommand, actionCommand) => {
    const {
      strictConfig,
      config: configPath,
      verbose,
    } = thisCommand.opts<{
      strictConfig?: boolean;
      config?: string;
      verbose?: boolean;
    }>();
    const resolvedConfig = await resolveCliConfig({ strictConfig, configPath, verbose });
    actionCommand.setOptionValue("resolvedConfig", resolvedConfig);
  });

program.addCommand(runCommand);
program.addCommand(healthCommand);
program.addCommand(configCommand);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CliUsageError) {
      logger.error(error.message);
    } else {
      logger.error(toCliRuntimeError(error).toPublicString());
    }
    process.exitCode = 1;
  }
}

void main();
