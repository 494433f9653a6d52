export const SNAPSHOT_VERSION = 1;

export interface SlotSnapshot {
  address: string;
  commitment: string;
  revealedChoice: number;
}

/**
 * Wire form of a GameState. Amounts are decimal strings so the snapshot
 * survives JSON; `digest` is keccak256 over the canonical encoding of every
 * other field.
 */
export interface GameSnapshot {
  version: number;
  bet: string;
  deposit: string;
  revealWindow: string;
  revealDeadline: string;
  stage: number;
  locked: boolean;
  round: number;
  slots: SlotSnapshot[];
  balances: Record<string, string>;
  digest: string;
}

export type UnsignedSnapshot = Omit<GameSnapshot, "digest">;
