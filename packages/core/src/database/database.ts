import { Kysely, PostgresDialect } from "kysely";
import { Pool, PoolConfig } from "pg";
import { Database } from "./types";
import { getDatabaseUrl } from "./config";

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "::1"]);

/**
 * Pool settings for a connection string. TLS follows `sslmode` when given;
 * otherwise it is off for local hosts and on (unverified) elsewhere.
 */
export function getPoolConfig(connString?: string): PoolConfig {
  const connectionString = connString ?? getDatabaseUrl();
  const url = new URL(connectionString);
  const sslmode = url.searchParams.get("sslmode");

  let ssl: PoolConfig["ssl"];
  if (sslmode === "disable") {
    ssl = false;
  } else if (sslmode || !LOCAL_HOSTS.has(url.hostname)) {
    ssl = { rejectUnauthorized: false };
  } else {
    ssl = false;
  }

  return { connectionString, ssl, max: 5 };
}

export function createDb(connString?: string): Kysely<Database> {
  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new Pool(getPoolConfig(connString)),
    }),
  });
}
