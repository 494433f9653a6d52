import * as path from "path";
import { promises as fs } from "fs";
import { Migrator, FileMigrationProvider } from "kysely";
import { createDb } from "./database";

export interface MigrateOptions {
  /** Override DATABASE_URL from env */
  databaseUrl?: string;
  /** Optional log function; defaults to console.log */
  log?: (message: string) => void;
}

/**
 * Apply every pending migration under ./migrations. Opens and closes its own
 * pool so it can run before the shared connection exists.
 */
export async function migrateToLatest(
  options: MigrateOptions = {}
): Promise<string[]> {
  const log = options.log ?? console.log;
  const db = createDb(options.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      migrationFolder: path.join(__dirname, "migrations"),
    }),
  });

  log("Running database migrations...");

  try {
    const { error, results } = await migrator.migrateToLatest();
    const applied: string[] = [];

    for (const it of results ?? []) {
      if (it.status === "Success") {
        applied.push(it.migrationName);
        log(`Migration "${it.migrationName}" executed successfully`);
      } else if (it.status === "Error") {
        log(`Migration "${it.migrationName}" failed`);
      }
    }

    if (error) {
      throw error;
    }

    log("Database migrations complete");
    return applied;
  } finally {
    await db.destroy();
  }
}
