import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";

export type ConfigSource = "default" | "file" | "env" | "cli";

const cliOverrides: Partial<ConfigData> = {};

// filled by initConfig in the commander preAction hook
let loaded: ConfigData | null = null;

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

/**
 * Resolve every key as default < config file < environment < CLI flag.
 * Empty strings never override.
 */
export async function resolveConfigWithSources(): Promise<{
  config: ConfigData;
  sources: Record<keyof ConfigData, ConfigSource>;
}> {
  const fileConfig = await readConfigFile();
  const config: ConfigData = { ...DEFAULTS };
  const sources: Record<keyof ConfigData, ConfigSource> = {
    redisUrl: "default",
    databaseUrl: "default",
    instance: "default",
    operators: "default",
    logLevel: "default",
  };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      config[key] = fileVal;
      sources[key] = "file";
    }

    const envVal = process.env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      config[key] = envVal;
      sources[key] = "env";
    }

    const cliVal = cliOverrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      config[key] = cliVal;
      sources[key] = "cli";
    }
  }

  return { config, sources };
}

export async function resolveConfig(): Promise<ConfigData> {
  const { config } = await resolveConfigWithSources();
  return config;
}

/** Resolve the layers once for the running command. */
export async function initConfig(): Promise<ConfigData> {
  loaded = await resolveConfig();
  return loaded;
}

export function getConfig(): ConfigData {
  if (!loaded) {
    throw new Error("rpswager config was read before initConfig() loaded it");
  }
  return loaded;
}
