import { Command } from "commander";
import { formatEther } from "ethers";
import {
  CHOICE_NAMES,
  Round,
  createDb,
  listRounds,
  listRoundsForPlayer,
  normalizeAddress,
} from "@rpswager/core";
import { initConfig, setCliOverride } from "../config";

export function registerHistoryCommand(program: Command): void {
  program
    .command("history")
    .description("List settled rounds from the database")
    .option("-i, --instance <name>", "Instance to list (overrides config)")
    .option("-p, --player <address>", "List rounds of one player across instances")
    .option("-l, --limit <count>", "Number of rounds to show", "20")
    .action(async (opts) => {
      if (opts.instance) {
        setCliOverride("instance", opts.instance);
      }
      let player: string | null;
      try {
        player = playerFilter(opts.player);
      } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
      const config = await initConfig();
      if (!config.databaseUrl) {
        console.error('No database configured. Run "rpswager config set databaseUrl <url>"');
        process.exit(1);
      }
      const db = createDb(config.databaseUrl);

      try {
        const limit = parseInt(opts.limit) || 20;
        const rounds = player
          ? await listRoundsForPlayer(db, player, limit)
          : await listRounds(db, config.instance, limit);

        console.log("\nSettled rounds:");
        console.log("───────────────");
        if (rounds.length === 0) {
          console.log("  No rounds recorded");
        }
        for (const round of rounds) {
          for (const line of formatRound(round)) {
            console.log(line);
          }
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      } finally {
        await db.destroy();
      }
    });
}

/** Rows hold checksummed addresses, so the filter is normalized first. */
export function playerFilter(raw: string | undefined): string | null {
  if (raw === undefined) {
    return null;
  }
  const address = normalizeAddress(raw.trim());
  if (!address) {
    throw new Error(`Invalid player address: ${raw}`);
  }
  return address;
}

export function formatRound(round: Round): string[] {
  const outcome = round.forfeit ? `${round.outcome} (forfeit)` : round.outcome;
  return [
    `  ${round.instance} #${round.round}  ${outcome}  block ${round.settled_block}`,
    `    ${round.player_one}  ${choiceName(round.choice_one)}  paid ${formatEther(round.payout_one)} ETH`,
    `    ${round.player_two}  ${choiceName(round.choice_two)}  paid ${formatEther(round.payout_two)} ETH`,
    "",
  ];
}

const CHOICE_BY_VALUE: Record<number, string> = CHOICE_NAMES;

function choiceName(value: number): string {
  return CHOICE_BY_VALUE[value] ?? String(value);
}
