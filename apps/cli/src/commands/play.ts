import { Command } from "commander";
import { formatEther, parseEther } from "ethers";
import {
  CHOICE_NAMES,
  Choice,
  MemoryStateStore,
  RedisStateStore,
  Settlement,
  StateStore,
  createDb,
  createRedisClient,
} from "@rpswager/core";
import { parseChoice } from "@rpswager/engine";
import { LocalChain, TestPlayer, createPlayer } from "@rpswager/devchain";
import { getConfig, initConfig, setCliOverride } from "../config";
import { GameService } from "../services/GameService";
import { PgRoundHistory, RoundHistory } from "../services/RoundHistory";
import log from "../logger";

export interface ScriptedRoundOptions {
  bet: bigint;
  deposit: bigint;
  revealWindow: bigint;
  first: Choice;
  second: Choice;
  /** The second player never reveals and the first calls forceForfeit */
  forfeit: boolean;
  store?: StateStore;
  history?: RoundHistory;
  instance?: string;
}

export interface ScriptedRoundResult {
  chain: LocalChain;
  players: [TestPlayer, TestPlayer];
  settlement: Settlement;
  withdrawn: bigint;
}

/**
 * Play one full round between two fresh accounts on an in-process chain:
 * commit, reveal (or forfeit), distribute, then withdraw any leftover.
 */
export async function playScriptedRound(opts: ScriptedRoundOptions): Promise<ScriptedRoundResult> {
  const chain = new LocalChain();
  const service = new GameService({
    store: opts.store ?? new MemoryStateStore(),
    host: chain,
    history: opts.history,
    instance: opts.instance,
  });

  await service.initialize({ bet: opts.bet, deposit: opts.deposit, revealWindow: opts.revealWindow });

  const stake = opts.bet + opts.deposit;
  const players: [TestPlayer, TestPlayer] = [createPlayer(opts.first), createPlayer(opts.second)];
  for (const player of players) {
    chain.fund(player.address, stake);
    await chain.call(player.address, stake, (ctx) => service.commit(ctx, player.commitment));
  }

  const [first, second] = players;
  await chain.call(first.address, 0n, (ctx) => service.reveal(ctx, first.choice, first.blindingFactor));
  if (opts.forfeit) {
    chain.mine(opts.revealWindow + 1n);
    await chain.call(first.address, 0n, (ctx) => service.forceForfeit(ctx));
  } else {
    await chain.call(second.address, 0n, (ctx) => service.reveal(ctx, second.choice, second.blindingFactor));
  }

  const settlement = await chain.call(first.address, 0n, (ctx) => service.distribute(ctx));

  let withdrawn = 0n;
  const winner = settlement.retained.findIndex((amount) => amount > 0n);
  if (winner >= 0) {
    const account = players[winner].address;
    withdrawn = await chain.call(account, 0n, (ctx) => service.withdraw(ctx));
  }

  return { chain, players, settlement, withdrawn };
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a scripted round between two throwaway accounts on a local chain")
    .option("--bet <ETH>", "Bet per player", "1")
    .option("--deposit <ETH>", "Good-faith deposit per player", "0.1")
    .option("--window <blocks>", "Blocks the second player has to reveal", "10")
    .option("--first <choice>", "First player's choice", "rock")
    .option("--second <choice>", "Second player's choice", "scissors")
    .option("--forfeit", "Second player never reveals", false)
    .option("--redis", "Store snapshots in Redis instead of memory", false)
    .option("--redis-url <url>", "Redis URL (overrides config)")
    .action(async (opts) => {
      if (opts.redisUrl) {
        setCliOverride("redisUrl", opts.redisUrl);
      }
      await initConfig();

      let round: ScriptedRoundOptions;
      try {
        round = {
          bet: parseEther(opts.bet),
          deposit: parseEther(opts.deposit),
          revealWindow: BigInt(opts.window),
          first: parseChoice(opts.first),
          second: parseChoice(opts.second),
          forfeit: Boolean(opts.forfeit),
        };
      } catch (err) {
        console.error(`Invalid option: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }

      const { redisUrl, databaseUrl } = getConfig();
      const redis = opts.redis ? createRedisClient(redisUrl) : null;
      const db = databaseUrl ? createDb(databaseUrl) : null;
      try {
        if (db) {
          round.history = new PgRoundHistory(db);
        }
        if (redis) {
          round.instance = `play:${Date.now()}`;
          round.store = new RedisStateStore(redis, round.instance);
        }
        const result = await playScriptedRound(round);
        printRound(result);
        if (round.instance) {
          console.log(`\n  Snapshot stored under instance ${round.instance}`);
        }
      } catch (err) {
        log.error({ err }, "Scripted round failed");
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      } finally {
        if (redis) {
          await redis.quit();
        }
        if (db) {
          await db.destroy();
        }
      }
    });
}

function printRound({ chain, players, settlement, withdrawn }: ScriptedRoundResult): void {
  console.log("\nRound:");
  console.log("──────");
  players.forEach((player, i) => {
    console.log(`  Player ${i + 1}: ${player.address}  (${CHOICE_NAMES[player.choice]})`);
  });
  console.log(`  Outcome: ${settlement.outcome}${settlement.forfeit ? " (forfeit)" : ""}`);
  players.forEach((player, i) => {
    console.log(
      `  Player ${i + 1} paid ${formatEther(settlement.payouts[i])} ETH, ` +
        `retained ${formatEther(settlement.retained[i])} ETH`
    );
  });
  if (withdrawn > 0n) {
    console.log(`  Withdrawn after settlement: ${formatEther(withdrawn)} ETH`);
  }
  console.log("\nFinal balances:");
  for (const player of players) {
    console.log(`  ${player.address}: ${formatEther(chain.balanceOf(player.address))} ETH`);
  }
  console.log(`  custody: ${formatEther(chain.balanceOf(chain.custody))} ETH`);
}
