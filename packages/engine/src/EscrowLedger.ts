import { RpsError, RpsErrorCode, ValueTransfer } from "@rpswager/core";

/**
 * Accounting view over the balances of one game instance.
 *
 * The ledger never moves value itself: `payout` debits and stages a transfer,
 * and the owning operation hands the staged batch to the host when it
 * commits. Operations run against a draft copy of the balances, so a
 * rejected batch leaves the committed ledger untouched.
 */
export class EscrowLedger {
  private outbox: ValueTransfer[] = [];

  constructor(private balances: Map<string, bigint>) {}

  balanceOf(identity: string): bigint {
    return this.balances.get(identity) ?? 0n;
  }

  /** Sum of every balance: the value the host should hold in custody. */
  totalHeld(): bigint {
    let total = 0n;
    for (const amount of this.balances.values()) {
      total += amount;
    }
    return total;
  }

  /** Record value already moved into custody on `identity`'s behalf. */
  deposit(identity: string, amount: bigint): void {
    assertAmount(amount);
    this.balances.set(identity, this.balanceOf(identity) + amount);
  }

  debit(identity: string, amount: bigint): void {
    assertAmount(amount);
    const balance = this.balanceOf(identity);
    if (balance < amount) {
      throw new RpsError(
        RpsErrorCode.InsufficientFunds,
        `${identity} holds ${balance}, needs ${amount}`
      );
    }
    // entries are zeroed, never removed
    this.balances.set(identity, balance - amount);
  }

  /** Debit `identity` and stage a transfer of the same amount to it. */
  payout(identity: string, amount: bigint): void {
    this.debit(identity, amount);
    this.outbox.push({ to: identity, amount });
  }

  /** Transfers staged by `payout` since this view was created. */
  pendingTransfers(): ValueTransfer[] {
    return this.outbox.map((t) => ({ ...t }));
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new RpsError(RpsErrorCode.InvalidArgument, `Negative amount: ${amount}`);
  }
}
