import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, isConfigKey } from "./defaults";

/** Overridable so tests never touch the real home directory. */
export function getConfigDir(): string {
  return process.env.RPSWAGER_CONFIG_DIR || join(homedir(), ".rpswager");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  let raw: string;
  try {
    raw = await readFile(getConfigPath(), "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    console.error(
      `Warning: ${getConfigPath()} is malformed and was ignored. ` +
        `Run "rpswager config set" to recreate it.`,
    );
    return {};
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const data: Partial<ConfigData> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key) && typeof value === "string") {
      data[key] = value;
    }
  }
  return data;
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
