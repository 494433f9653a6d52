/** A player's hidden choice. `None` means "not revealed". */
export enum Choice {
  None = 0,
  Rock = 1,
  Paper = 2,
  Scissors = 3,
}

/** Protocol phase. Values are stable: they appear in snapshots. */
export enum Stage {
  FirstCommit = 0,
  SecondCommit = 1,
  FirstReveal = 2,
  SecondReveal = 3,
  Distribute = 4,
}

export enum Outcome {
  Draw = "draw",
  FirstWins = "first_wins",
  SecondWins = "second_wins",
  /** Neither player revealed */
  Invalid = "invalid",
}

export interface GameConfig {
  /** Stake each player puts into the pot */
  bet: bigint;
  /** Good-faith amount forfeited on non-reveal */
  deposit: bigint;
  /** Blocks the second revealer has after the first reveal */
  revealWindow: bigint;
}

export interface PlayerSlot {
  /** Checksummed EVM address */
  address: string;
  /** 0x-prefixed 32-byte hash */
  commitment: string;
  revealedChoice: Choice;
}

/**
 * The full Game + Ledger aggregate for one deployment.
 * Slots are filled in commit order, so `slots[0]` is always the first committer.
 */
export interface GameState {
  config: GameConfig;
  stage: Stage;
  locked: boolean;
  /** Absolute block height; 0n when not armed */
  revealDeadline: bigint;
  /** Number of completed distributions */
  round: number;
  slots: PlayerSlot[];
  balances: Map<string, bigint>;
}

/** Caller identity and attached value, supplied per call by the host. */
export interface CallContext {
  caller: string;
  value: bigint;
}

export interface ValueTransfer {
  to: string;
  amount: bigint;
}

/** Result of splitting the escrowed pool at distribution. */
export interface Settlement {
  outcome: Outcome;
  /** True when the win came from a non-reveal */
  forfeit: boolean;
  /** Transferred out now, indexed by slot */
  payouts: [bigint, bigint];
  /** Left in the owner's ledger balance, indexed by slot */
  retained: [bigint, bigint];
}

export const CHOICE_NAMES: Record<Choice, string> = {
  [Choice.None]: "none",
  [Choice.Rock]: "rock",
  [Choice.Paper]: "paper",
  [Choice.Scissors]: "scissors",
};

export const STAGE_NAMES: Record<Stage, string> = {
  [Stage.FirstCommit]: "first_commit",
  [Stage.SecondCommit]: "second_commit",
  [Stage.FirstReveal]: "first_reveal",
  [Stage.SecondReveal]: "second_reveal",
  [Stage.Distribute]: "distribute",
};
