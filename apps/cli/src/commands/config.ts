import { Command } from "commander";
import {
  resolveConfig,
  resolveConfigWithSources,
  updateConfigFile,
  getConfigPath,
  isConfigKey,
  CONFIG_KEYS,
  ConfigData,
} from "../config";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.rpswager/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${displayValue(key, value)}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      const { config, sources } = await resolveConfigWithSources();

      console.log(`\nConfig file: ${getConfigPath()}`);
      console.log("──────────────────────────────────────");
      for (const key of CONFIG_KEYS) {
        console.log(`  ${key}: ${displayValue(key, config[key])}  (${sources[key]})`);
      }
      console.log("");
    });
}

/** Hide the password part of connection URLs. */
export function displayValue(key: keyof ConfigData, value: string): string {
  if (value === "") return "(not set)";
  if (key !== "redisUrl" && key !== "databaseUrl") return value;

  try {
    const url = new URL(value);
    if (url.password) {
      url.password = "****";
    }
    return url.toString();
  } catch {
    // not a URL; show as typed
    return value;
  }
}
