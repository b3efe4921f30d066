/**
 * Payloads command - Print the built-in payload list
 */

import type { Command } from "commander";

import { DEFAULT_PAYLOADS } from "../../engine/payloads.js";

export function registerPayloadsCommand(program: Command): void {
  program
    .command("payloads")
    .description("Print the built-in payloads, one per line")
    .action(() => {
      for (const payload of DEFAULT_PAYLOADS) {
        console.log(payload);
      }
    });
}
