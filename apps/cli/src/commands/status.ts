import { Command } from "commander";
import { formatEther } from "ethers";
import { CHOICE_NAMES, GameState, RedisStateStore, STAGE_NAMES, createRedisClient } from "@rpswager/core";
import { deserializeState } from "@rpswager/engine";
import { getConfig, initConfig, setCliOverride } from "../config";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show the stored state of a game instance")
    .option("-i, --instance <name>", "Instance to inspect (overrides config)")
    .option("--history <count>", "Also list this many earlier snapshots", "0")
    .action(async (opts) => {
      if (opts.instance) {
        setCliOverride("instance", opts.instance);
      }
      const config = await initConfig();
      const redis = createRedisClient(getConfig().redisUrl);
      const store = new RedisStateStore(redis, config.instance);

      try {
        const data = await store.read();
        if (data === null) {
          console.log(`Instance "${config.instance}" has no stored state`);
          return;
        }
        printState(config.instance, deserializeState(data));

        const count = parseInt(opts.history) || 0;
        if (count > 0) {
          const recent = await store.recent(count);
          console.log(`\nRecent snapshots (${recent.length}):`);
          for (const entry of recent) {
            const state = deserializeState(entry);
            console.log(`  round ${state.round}  ${STAGE_NAMES[state.stage]}${state.locked ? "  locked" : ""}`);
          }
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      } finally {
        await redis.quit();
      }
    });
}

export function formatState(instance: string, state: GameState): string[] {
  const lines = [
    `Instance: ${instance}`,
    `  Stage:    ${STAGE_NAMES[state.stage]}${state.locked ? " (locked)" : ""}`,
    `  Round:    ${state.round}`,
    `  Bet:      ${formatEther(state.config.bet)} ETH`,
    `  Deposit:  ${formatEther(state.config.deposit)} ETH`,
    `  Window:   ${state.config.revealWindow} blocks`,
  ];
  if (state.revealDeadline !== 0n) {
    lines.push(`  Deadline: block ${state.revealDeadline}`);
  }

  state.slots.forEach((slot, i) => {
    lines.push(`  Player ${i + 1}: ${slot.address}  ${CHOICE_NAMES[slot.revealedChoice]}`);
  });

  const held = [...state.balances].filter(([, amount]) => amount > 0n);
  if (held.length > 0) {
    lines.push("  Balances:");
    for (const [address, amount] of held) {
      lines.push(`    ${address}: ${formatEther(amount)} ETH`);
    }
  }
  return lines;
}

function printState(instance: string, state: GameState): void {
  console.log("");
  for (const line of formatState(instance, state)) {
    console.log(line);
  }
}
