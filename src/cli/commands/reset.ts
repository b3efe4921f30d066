/**
 * Reset command - Forget previous progress
 */

import { existsSync } from "fs";
import { resolve } from "path";

import type { Command } from "commander";

import { StateStore } from "../../engine/state-store.js";
import { DEFAULTS, loadConfigFile } from "../config.js";
import { formatError, formatSuccess } from "../formatters.js";

export function registerResetCommand(program: Command): void {
  program
    .command("reset")
    .description("Delete the state file so the next run starts from scratch")
    .option("--state-file <path>", "State file to delete")
    .option("--config <path>", "YAML config file (default: rce_config.yaml when present)")
    .action(async (options: { stateFile?: string; config?: string }) => {
      const fileConfig = loadConfigFile(options.config);
      if (!fileConfig.success) {
        console.error(formatError(fileConfig.error));
        process.exit(1);
      }

      const statePath = resolve(options.stateFile ?? fileConfig.data.stateFile ?? DEFAULTS.stateFile);
      if (!existsSync(statePath)) {
        console.log(formatSuccess(`No state file at ${statePath}`));
        return;
      }

      try {
        await new StateStore(statePath).reset();
        console.log(formatSuccess(`Deleted ${statePath}`));
      } catch (error) {
        console.error(formatError(error instanceof Error ? error : new Error(String(error))));
        process.exit(1);
      }
    });
}
