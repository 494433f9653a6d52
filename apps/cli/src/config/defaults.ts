export interface ConfigData {
  redisUrl: string;
  /** Postgres URL for round history; empty disables history */
  databaseUrl: string;
  /** Key namespace of the game instance in Redis */
  instance: string;
  /** Comma-separated operator addresses */
  operators: string;
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "redisUrl",
  "databaseUrl",
  "instance",
  "operators",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  redisUrl: "redis://localhost:6379",
  databaseUrl: "",
  instance: "default",
  operators: "",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  redisUrl: "REDIS_URL",
  databaseUrl: "DATABASE_URL",
  instance: "RPS_INSTANCE",
  operators: "RPS_OPERATORS",
  logLevel: "LOG_LEVEL",
};

export function isConfigKey(key: string): key is keyof ConfigData {
  return (CONFIG_KEYS as string[]).includes(key);
}

/** Parse the comma-separated `operators` setting. */
export function parseOperators(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}
