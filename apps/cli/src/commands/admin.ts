import { readFile, writeFile } from "node:fs/promises";
import { Command } from "commander";
import { GameSnapshot, RedisStateStore, createRedisClient } from "@rpswager/core";
import { LocalChain } from "@rpswager/devchain";
import { getConfig, initConfig, parseOperators, setCliOverride } from "../config";
import { GameService } from "../services/GameService";

/**
 * Operator commands against a stored instance. Administrative operations
 * never move value, so an idle local chain serves as the host.
 */
export function registerAdminCommand(program: Command): void {
  const admin = program
    .command("admin")
    .description("Operator controls: lock, unlock, export and import state")
    .requiredOption("--as <address>", "Operator address making the call")
    .option("-i, --instance <name>", "Instance to operate on (overrides config)");

  admin
    .command("lock")
    .description("Stop all player operations")
    .action(async () => {
      await withService(admin, async (service, caller) => {
        await service.lock({ caller, value: 0n });
        console.log(`Instance "${service.instance}" locked`);
      });
    });

  admin
    .command("unlock")
    .description("Resume player operations")
    .action(async () => {
      await withService(admin, async (service, caller) => {
        await service.unlock({ caller, value: 0n });
        console.log(`Instance "${service.instance}" unlocked`);
      });
    });

  admin
    .command("export [file]")
    .description("Write the locked instance's snapshot to a file (or stdout)")
    .action(async (file?: string) => {
      await withService(admin, async (service, caller) => {
        const snapshot = await service.exportState({ caller, value: 0n });
        const json = JSON.stringify(snapshot, null, 2) + "\n";
        if (file) {
          await writeFile(file, json, "utf-8");
          console.log(`Exported ${snapshot.digest} to ${file}`);
        } else {
          process.stdout.write(json);
        }
      });
    });

  admin
    .command("import <file>")
    .description("Replace the locked instance's state with a snapshot file")
    .action(async (file: string) => {
      await withService(admin, async (service, caller) => {
        const parsed: unknown = JSON.parse(await readFile(file, "utf-8"));
        const stored: GameSnapshot = await service.importState({ caller, value: 0n }, parsed);
        console.log(`Imported ${stored.digest}; instance stays locked until "admin unlock"`);
      });
    });
}

async function withService(
  admin: Command,
  run: (service: GameService, caller: string) => Promise<void>
): Promise<void> {
  const opts = admin.opts();
  if (opts.instance) {
    setCliOverride("instance", opts.instance);
  }
  const config = await initConfig();
  const redis = createRedisClient(getConfig().redisUrl);

  try {
    const service = new GameService({
      store: new RedisStateStore(redis, config.instance),
      host: new LocalChain(),
      operators: parseOperators(config.operators),
      instance: config.instance,
    });
    await run(service, String(opts.as));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    await redis.quit();
  }
}
