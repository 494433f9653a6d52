import {
  CallContext,
  GameSnapshot,
  RpsError,
  RpsErrorCode,
  normalizeAddress,
} from "@rpswager/core";
import type { Transaction } from "./RpsGame";
import { fromSnapshot, toSnapshot } from "./snapshot";

/** Decides whether an identity may run administrative operations. */
export type OperatorCheck = (identity: string) => boolean;

/**
 * Operator check over a fixed list of addresses (any case).
 */
export function operatorList(addresses: string[]): OperatorCheck {
  const allowed = new Set<string>();
  for (const address of addresses) {
    const normalized = normalizeAddress(address.trim());
    if (!normalized) {
      throw new RpsError(RpsErrorCode.InvalidArgument, `Operator is not an address: ${address}`);
    }
    allowed.add(normalized);
  }
  return (identity) => {
    const normalized = normalizeAddress(identity);
    return normalized !== null && allowed.has(normalized);
  };
}

/**
 * Lock gate and whole-state transfer. Who counts as an operator is decided
 * outside the core and injected as an OperatorCheck.
 */
export class AdminControl {
  constructor(private isOperator: OperatorCheck) {}

  /** Idempotent. Returns the lock flag after the call. */
  setLocked(tx: Transaction, ctx: CallContext, locked: boolean): boolean {
    const by = this.authorize(ctx);
    if (tx.state.locked !== locked) {
      tx.state.locked = locked;
      tx.events.push(locked ? { type: "Locked", by } : { type: "Unlocked", by });
    }
    return tx.state.locked;
  }

  exportState(tx: Transaction, ctx: CallContext): GameSnapshot {
    const by = this.authorize(ctx);
    requireLocked(tx);
    const snapshot = toSnapshot(tx.state);
    tx.events.push({ type: "StateExported", by, digest: snapshot.digest });
    return snapshot;
  }

  /**
   * Replace the whole state with a validated snapshot. The game stays locked
   * afterwards regardless of the snapshot's own flag, so the operator can
   * inspect it before unlocking.
   */
  importState(tx: Transaction, ctx: CallContext, snapshot: unknown): GameSnapshot {
    const by = this.authorize(ctx);
    requireLocked(tx);

    const next = fromSnapshot(snapshot);
    next.locked = true;
    tx.state = next;

    const stored = toSnapshot(next);
    tx.events.push({ type: "StateImported", by, digest: stored.digest, stage: next.stage });
    return stored;
  }

  private authorize(ctx: CallContext): string {
    if (ctx.value !== 0n) {
      throw new RpsError(RpsErrorCode.InvalidArgument, "Administrative calls do not accept value");
    }
    const caller = normalizeAddress(ctx.caller);
    if (!caller || !this.isOperator(caller)) {
      throw new RpsError(RpsErrorCode.Unauthorized, `${ctx.caller} is not an operator`);
    }
    return caller;
  }
}

function requireLocked(tx: Transaction): void {
  if (!tx.state.locked) {
    throw new RpsError(RpsErrorCode.NotLocked, "State transfer requires the game to be locked");
  }
}
