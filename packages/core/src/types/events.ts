import { Choice, Outcome, Stage } from "./game";

export type GameEvent =
  | { type: "Initialized"; bet: bigint; deposit: bigint; revealWindow: bigint }
  | { type: "Committed"; player: string; slot: number; commitment: string; stage: Stage }
  | { type: "Refunded"; player: string; amount: bigint }
  | { type: "Revealed"; player: string; slot: number; choice: Choice; revealDeadline: bigint }
  | { type: "Forfeited"; player: string; slot: number; calledBy: string }
  | { type: "Payout"; player: string; amount: bigint }
  | {
      type: "RoundSettled";
      round: number;
      outcome: Outcome;
      forfeit: boolean;
      players: [string, string];
      choices: [Choice, Choice];
      payouts: [bigint, bigint];
      retained: [bigint, bigint];
      blockNumber: bigint;
    }
  | { type: "Withdrawn"; player: string; amount: bigint }
  | { type: "Locked"; by: string }
  | { type: "Unlocked"; by: string }
  | { type: "StateExported"; by: string; digest: string }
  | { type: "StateImported"; by: string; digest: string; stage: Stage };

export type RoundSettledEvent = Extract<GameEvent, { type: "RoundSettled" }>;
