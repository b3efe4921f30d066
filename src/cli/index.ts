#!/usr/bin/env node
/**
 * qsprobe CLI entry point
 *
 * Commands:
 * - run      - Test URLs with RCE payloads (default)
 * - reset    - Delete the resume state
 * - payloads - Print the built-in payloads
 */

import { Command } from "commander";

import { VERSION } from "../engine/index.js";

import { registerPayloadsCommand } from "./commands/payloads.js";
import { registerResetCommand } from "./commands/reset.js";
import { registerRunCommand } from "./commands/run.js";

const program = new Command();

program
  .name("qsprobe")
  .description("Batch RCE payload testing through qsreplace and gf")
  .version(VERSION);

registerRunCommand(program);
registerResetCommand(program);
registerPayloadsCommand(program);

await program.parseAsync();
