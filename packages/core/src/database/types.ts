import { Generated, Selectable, Insertable } from "kysely";

// ---- rounds ----

export interface RoundsTable {
  id: Generated<number>;
  instance: string;
  round: number;
  outcome: string;
  forfeit: boolean;
  player_one: string;
  player_two: string;
  choice_one: number;
  choice_two: number;
  /** uint256 amounts as decimal strings */
  payout_one: string;
  payout_two: string;
  retained_one: string;
  retained_two: string;
  settled_block: string;
  created_at: Generated<Date>;
}

export type Round = Selectable<RoundsTable>;
export type NewRound = Insertable<RoundsTable>;

export interface Database {
  rounds: RoundsTable;
}
