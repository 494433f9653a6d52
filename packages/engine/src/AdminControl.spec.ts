import { strict as assert } from "assert";
import { GameState, Stage } from "@rpswager/core";
import { AdminControl, operatorList } from "./AdminControl";
import { EscrowLedger } from "./EscrowLedger";
import type { Transaction } from "./RpsGame";
import { toSnapshot } from "./snapshot";

const OPERATOR = "0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045";
const STRANGER = "0x1111111111111111111111111111111111111111";

function freshTx(): Transaction {
  const state: GameState = {
    config: { bet: 5n, deposit: 1n, revealWindow: 3n },
    stage: Stage.FirstCommit,
    locked: false,
    revealDeadline: 0n,
    round: 0,
    slots: [],
    balances: new Map(),
  };
  return { state, ledger: new EscrowLedger(state.balances), events: [] };
}

describe("operatorList", () => {
  it("should match addresses regardless of case", () => {
    const isOperator = operatorList(["0xd8da6bf26964af9d7eed9e03e53415d37aa96045"]);
    assert.equal(isOperator(OPERATOR), true);
    assert.equal(isOperator(OPERATOR.toLowerCase()), true);
    assert.equal(isOperator(STRANGER), false);
    assert.equal(isOperator("not an address"), false);
  });

  it("should reject entries that are not addresses", () => {
    assert.throws(() => operatorList(["alice"]), /InvalidArgument: Operator is not an address: alice/);
  });
});

describe("AdminControl", () => {
  const admin = new AdminControl(operatorList([OPERATOR]));

  it("should toggle the lock and report only real changes", () => {
    const tx = freshTx();
    assert.equal(admin.setLocked(tx, { caller: OPERATOR, value: 0n }, true), true);
    assert.equal(admin.setLocked(tx, { caller: OPERATOR, value: 0n }, true), true);
    assert.equal(admin.setLocked(tx, { caller: OPERATOR, value: 0n }, false), false);
    assert.deepEqual(tx.events, [
      { type: "Locked", by: OPERATOR },
      { type: "Unlocked", by: OPERATOR },
    ]);
  });

  it("should reject callers that are not operators", () => {
    assert.throws(
      () => admin.setLocked(freshTx(), { caller: STRANGER, value: 0n }, true),
      /Unauthorized: 0x1111111111111111111111111111111111111111 is not an operator/
    );
  });

  it("should reject attached value", () => {
    assert.throws(
      () => admin.setLocked(freshTx(), { caller: OPERATOR, value: 1n }, true),
      /InvalidArgument: Administrative calls do not accept value/
    );
  });

  it("should keep the game locked after importing an unlocked snapshot", () => {
    const tx = freshTx();
    tx.state.locked = true;

    const source = freshTx().state;
    source.round = 4;
    const snapshot = toSnapshot(source);
    assert.equal(snapshot.locked, false);

    const stored = admin.importState(tx, { caller: OPERATOR, value: 0n }, snapshot);
    assert.equal(tx.state.locked, true);
    assert.equal(tx.state.round, 4);
    assert.equal(stored.locked, true);
    assert.notEqual(stored.digest, snapshot.digest);
    assert.deepEqual(tx.events, [
      { type: "StateImported", by: OPERATOR, digest: stored.digest, stage: Stage.FirstCommit },
    ]);
  });

  it("should export with the digest of the current state", () => {
    const tx = freshTx();
    tx.state.locked = true;
    const snapshot = admin.exportState(tx, { caller: OPERATOR, value: 0n });
    assert.equal(snapshot.digest, toSnapshot(tx.state).digest);
    assert.deepEqual(tx.events, [{ type: "StateExported", by: OPERATOR, digest: snapshot.digest }]);
  });
});
