import { Kysely } from "kysely";
import { Database, NewRound, RoundSettledEvent, createRound } from "@rpswager/core";

/**
 * Sink for settled rounds. Recording is best effort: a round is settled once
 * the snapshot is stored, whether or not history caught it.
 */
export interface RoundHistory {
  record(instance: string, event: RoundSettledEvent): Promise<void>;
}

export function toRoundRow(instance: string, event: RoundSettledEvent): NewRound {
  return {
    instance,
    round: event.round,
    outcome: event.outcome,
    forfeit: event.forfeit,
    player_one: event.players[0],
    player_two: event.players[1],
    choice_one: event.choices[0],
    choice_two: event.choices[1],
    payout_one: event.payouts[0].toString(),
    payout_two: event.payouts[1].toString(),
    retained_one: event.retained[0].toString(),
    retained_two: event.retained[1].toString(),
    settled_block: event.blockNumber.toString(),
  };
}

/** Writes rounds to the Postgres `rounds` table. */
export class PgRoundHistory implements RoundHistory {
  constructor(private db: Kysely<Database>) {}

  async record(instance: string, event: RoundSettledEvent): Promise<void> {
    await createRound(this.db, toRoundRow(instance, event));
  }
}
