import { Wallet } from "ethers";
import {
  CallContext,
  TransferRejectedError,
  ValueTransfer,
  normalizeAddress,
} from "@rpswager/core";
import { HostEnvironment } from "@rpswager/engine";

export interface LocalChainOptions {
  /** Height of the first block (default 1) */
  startBlock?: bigint;
  /** Account that holds attached value (default: a random address) */
  custody?: string;
}

export interface TransferReceipt {
  block: bigint;
  from: string;
  to: string;
  amount: bigint;
}

/**
 * In-process host: plain account balances, a block counter, and one custody
 * account standing in for the deployed game.
 *
 * `call` behaves like a transaction: the attached value moves into custody
 * before the body runs, and every balance change made during the body is
 * reverted if it throws.
 */
export class LocalChain implements HostEnvironment {
  readonly custody: string;
  private accounts = new Map<string, bigint>();
  private height: bigint;
  private rejecting = new Set<string>();
  private receipts: TransferReceipt[] = [];

  constructor(opts: LocalChainOptions = {}) {
    this.height = opts.startBlock ?? 1n;
    this.custody = requireAddress(opts.custody ?? Wallet.createRandom().address);
  }

  blockNumber(): bigint {
    return this.height;
  }

  /** Advance the chain; returns the new height. */
  mine(blocks = 1n): bigint {
    this.height += blocks;
    return this.height;
  }

  balanceOf(address: string): bigint {
    return this.accounts.get(requireAddress(address)) ?? 0n;
  }

  /** Mint value into an account (test faucet). */
  fund(address: string, amount: bigint): void {
    const account = requireAddress(address);
    this.accounts.set(account, this.balanceOf(account) + amount);
  }

  /** Make an account refuse (or accept again) incoming transfers. */
  rejectTransfersTo(address: string, reject = true): void {
    const account = requireAddress(address);
    if (reject) {
      this.rejecting.add(account);
    } else {
      this.rejecting.delete(account);
    }
  }

  transfer(batch: ValueTransfer[]): void {
    let total = 0n;
    for (const { to, amount } of batch) {
      const recipient = normalizeAddress(to);
      if (!recipient) {
        throw new TransferRejectedError(to, "not an address");
      }
      if (amount < 0n) {
        throw new TransferRejectedError(recipient, `negative amount ${amount}`);
      }
      if (this.rejecting.has(recipient)) {
        throw new TransferRejectedError(recipient, "recipient refuses value");
      }
      total += amount;
    }

    const held = this.balanceOf(this.custody);
    if (held < total) {
      throw new TransferRejectedError(this.custody, `custody holds ${held}, batch needs ${total}`);
    }

    for (const { to, amount } of batch) {
      this.move(this.custody, requireAddress(to), amount);
    }
  }

  /**
   * Run `body` as a transaction from `caller` carrying `value`.
   */
  async call<T>(
    caller: string,
    value: bigint,
    body: (ctx: CallContext) => T | Promise<T>
  ): Promise<T> {
    const from = requireAddress(caller);
    if (value < 0n) {
      throw new Error(`Negative call value ${value}`);
    }
    if (this.balanceOf(from) < value) {
      throw new Error(`${from} cannot attach ${value}: balance ${this.balanceOf(from)}`);
    }

    const accounts = new Map(this.accounts);
    const receiptCount = this.receipts.length;

    this.move(from, this.custody, value);
    try {
      return await body({ caller: from, value });
    } catch (err) {
      this.accounts = accounts;
      this.receipts.length = receiptCount;
      throw err;
    }
  }

  /** Every value movement so far, oldest first. */
  getReceipts(): readonly TransferReceipt[] {
    return this.receipts;
  }

  private move(from: string, to: string, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    this.accounts.set(from, this.balanceOf(from) - amount);
    this.accounts.set(to, this.balanceOf(to) + amount);
    this.receipts.push({ block: this.height, from, to, amount });
  }
}

function requireAddress(address: string): string {
  const normalized = normalizeAddress(address);
  if (!normalized) {
    throw new Error(`Not an address: ${address}`);
  }
  return normalized;
}
