#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerPlayCommand } from "./commands/play";
import { registerStatusCommand } from "./commands/status";
import { registerAdminCommand } from "./commands/admin";
import { registerHistoryCommand } from "./commands/history";
import { registerMigrateCommand } from "./commands/migrate";
import { initConfig } from "./config";
import log, { parseLogLevel } from "./logger";

program
  .name("rpswager")
  .description("Commit-reveal rock/paper/scissors wagers with an escrow ledger")
  .version("0.1.0", "-v, --version");

// the config file may carry a log level the environment did not set
program.hook("preAction", async () => {
  const config = await initConfig();
  log.level(parseLogLevel(config.logLevel));
});

registerConfigCommand(program);
registerPlayCommand(program);
registerStatusCommand(program);
registerAdminCommand(program);
registerHistoryCommand(program);
registerMigrateCommand(program);

program.parseAsync().catch((err: unknown) => {
  log.fatal({ err }, "Command failed");
  process.exitCode = 1;
});
