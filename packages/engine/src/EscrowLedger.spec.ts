import { strict as assert } from "assert";
import { EscrowLedger } from "./EscrowLedger";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";

describe("EscrowLedger", () => {
  it("should track deposits per identity", () => {
    const ledger = new EscrowLedger(new Map());
    ledger.deposit(ALICE, 100n);
    ledger.deposit(ALICE, 5n);
    ledger.deposit(BOB, 7n);

    assert.equal(ledger.balanceOf(ALICE), 105n);
    assert.equal(ledger.balanceOf(BOB), 7n);
    assert.equal(ledger.balanceOf("0x3333333333333333333333333333333333333333"), 0n);
    assert.equal(ledger.totalHeld(), 112n);
  });

  it("should reject a debit larger than the balance", () => {
    const ledger = new EscrowLedger(new Map([[ALICE, 10n]]));
    assert.throws(
      () => ledger.debit(ALICE, 11n),
      /InsufficientFunds: 0x1111111111111111111111111111111111111111 holds 10, needs 11/
    );
    assert.equal(ledger.balanceOf(ALICE), 10n);
  });

  it("should keep a zeroed entry after a full debit", () => {
    const balances = new Map([[ALICE, 10n]]);
    new EscrowLedger(balances).debit(ALICE, 10n);
    assert.equal(balances.has(ALICE), true);
    assert.equal(balances.get(ALICE), 0n);
  });

  it("should stage a transfer for every payout", () => {
    const ledger = new EscrowLedger(new Map([
      [ALICE, 50n],
      [BOB, 50n],
    ]));
    ledger.payout(ALICE, 20n);
    ledger.payout(BOB, 50n);

    assert.deepEqual(ledger.pendingTransfers(), [
      { to: ALICE, amount: 20n },
      { to: BOB, amount: 50n },
    ]);
    assert.equal(ledger.balanceOf(ALICE), 30n);
    assert.equal(ledger.totalHeld(), 30n);
  });

  it("should not stage a payout it cannot cover", () => {
    const ledger = new EscrowLedger(new Map([[ALICE, 5n]]));
    assert.throws(() => ledger.payout(ALICE, 6n), /InsufficientFunds/);
    assert.deepEqual(ledger.pendingTransfers(), []);
  });

  it("should reject negative amounts", () => {
    const ledger = new EscrowLedger(new Map());
    assert.throws(() => ledger.deposit(ALICE, -1n), /InvalidArgument: Negative amount: -1/);
    assert.throws(() => ledger.debit(ALICE, -1n), /InvalidArgument/);
  });
});
