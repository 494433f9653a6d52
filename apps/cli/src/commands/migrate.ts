import { Command } from "commander";
import { migrateToLatest } from "@rpswager/core/src/migrate";
import { initConfig } from "../config";
import log from "../logger";

export function registerMigrateCommand(program: Command): void {
  program
    .command("migrate")
    .description("Create or upgrade the round history tables")
    .action(async () => {
      const config = await initConfig();
      if (!config.databaseUrl) {
        console.error('No database configured. Run "rpswager config set databaseUrl <url>"');
        process.exit(1);
      }

      try {
        const applied = await migrateToLatest({
          databaseUrl: config.databaseUrl,
          log: (message) => log.info(message),
        });
        console.log(applied.length > 0 ? `Applied ${applied.length} migration(s)` : "Already up to date");
      } catch (err) {
        log.error({ err }, "Migration failed");
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    });
}
