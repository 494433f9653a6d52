import { strict as assert } from "assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ENV_MAP, parseOperators } from "./defaults";
import { readConfigFile, updateConfigFile } from "./configFile";
import { clearCliOverrides, getConfig, initConfig, resolveConfigWithSources, setCliOverride } from "./resolve";

describe("config resolution", () => {
  const saved: Record<string, string | undefined> = {};
  const watched = ["RPSWAGER_CONFIG_DIR", ...Object.values(ENV_MAP)];
  let dir: string;

  beforeEach(async () => {
    for (const name of watched) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    dir = await mkdtemp(join(tmpdir(), "rpswager-config-"));
    process.env.RPSWAGER_CONFIG_DIR = dir;
    clearCliOverrides();
  });

  afterEach(async () => {
    clearCliOverrides();
    for (const name of watched) {
      if (saved[name] === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = saved[name];
      }
    }
    await rm(dir, { recursive: true, force: true });
  });

  it("should use defaults without a config file", async () => {
    const { config, sources } = await resolveConfigWithSources();
    assert.equal(config.redisUrl, "redis://localhost:6379");
    assert.equal(config.instance, "default");
    assert.equal(sources.redisUrl, "default");
  });

  it("should layer file < env < cli", async () => {
    await updateConfigFile("instance", "from-file");
    await updateConfigFile("logLevel", "debug");
    process.env.RPS_INSTANCE = "from-env";
    setCliOverride("instance", "from-cli");

    const { config, sources } = await resolveConfigWithSources();
    assert.equal(config.instance, "from-cli");
    assert.equal(sources.instance, "cli");
    assert.equal(config.logLevel, "debug");
    assert.equal(sources.logLevel, "file");

    clearCliOverrides();
    const envOnly = await resolveConfigWithSources();
    assert.equal(envOnly.config.instance, "from-env");
    assert.equal(envOnly.sources.instance, "env");
  });

  it("should not let empty values override", async () => {
    await updateConfigFile("redisUrl", "redis://cache:6379");
    process.env.REDIS_URL = "";
    const { config, sources } = await resolveConfigWithSources();
    assert.equal(config.redisUrl, "redis://cache:6379");
    assert.equal(sources.redisUrl, "file");
  });

  it("should serve the loaded config until the next initConfig", async () => {
    setCliOverride("instance", "first");
    const first = await initConfig();
    assert.equal(first.instance, "first");
    assert.equal(getConfig(), first);

    setCliOverride("instance", "second");
    assert.equal(getConfig().instance, "first");
    assert.equal((await initConfig()).instance, "second");
  });

  it("should keep only known string keys from the file", async () => {
    await writeFile(
      join(dir, "config.json"),
      JSON.stringify({ instance: "t1", operators: 5, serverUrl: "http://x" }),
      "utf-8"
    );
    assert.deepEqual(await readConfigFile(), { instance: "t1" });
  });
});

describe("parseOperators", () => {
  it("should split and trim a comma-separated list", () => {
    assert.deepEqual(parseOperators(" 0xaa , ,0xbb"), ["0xaa", "0xbb"]);
    assert.deepEqual(parseOperators(""), []);
  });
});
