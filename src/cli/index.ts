#!/usr/bin/env node

/**
 * IPC Series Loader CLI
 *
 * Loads consumer price index series into a star schema, incrementally.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerExportCommand } from "./commands/export.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("ipc-loader")
  .description("Consumer price index series loader")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);
registerExportCommand(program);
registerStatusCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

program.parse();
