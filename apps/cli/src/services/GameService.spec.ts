import { strict as assert } from "assert";
import { Choice, MAX_UINT256, MemoryStateStore, Outcome, RoundSettledEvent, Stage } from "@rpswager/core";
import { LocalChain, createPlayer } from "@rpswager/devchain";
import { GameService } from "./GameService";
import { RoundHistory } from "./RoundHistory";
import log from "../logger";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";
const OPERATOR = "0x3333333333333333333333333333333333333333";

const PARAMS = { bet: 100n, deposit: 10n, revealWindow: 5n };

class RecordingHistory implements RoundHistory {
  recorded: { instance: string; event: RoundSettledEvent }[] = [];
  fail = false;

  async record(instance: string, event: RoundSettledEvent): Promise<void> {
    if (this.fail) {
      throw new Error("database unavailable");
    }
    this.recorded.push({ instance, event });
  }
}

function setup() {
  const chain = new LocalChain({ startBlock: 50n });
  const store = new MemoryStateStore();
  const history = new RecordingHistory();
  const service = new GameService({ store, host: chain, history, operators: [OPERATOR], instance: "table-1" });
  chain.fund(ALICE, 1000n);
  chain.fund(BOB, 1000n);
  return { chain, store, history, service };
}

describe("GameService", () => {
  let previousLevel: number;

  before(() => {
    previousLevel = log.level();
    log.level("fatal");
  });

  after(() => {
    log.level(previousLevel);
  });

  it("should refuse operations before initialize", async () => {
    const { service } = setup();
    assert.equal(await service.status(), null);
    await assert.rejects(
      service.commit({ caller: ALICE, value: 110n }, "0x" + "ab".repeat(32)),
      /InvalidStage: Instance "table-1" is not initialized/
    );
  });

  it("should refuse to initialize twice", async () => {
    const { service } = setup();
    await service.initialize(PARAMS);
    await assert.rejects(service.initialize(PARAMS), /InvalidStage: Instance "table-1" is already initialized/);
  });

  it("should persist each committed operation", async () => {
    const { chain, store, service } = setup();
    const status = await service.initialize(PARAMS);
    assert.equal(status.stageName, "first_commit");
    assert.equal(store.getWriteCount(), 1);

    const alice = createPlayer(Choice.Rock, 1n, ALICE);
    await chain.call(ALICE, 110n, (ctx) => service.commit(ctx, alice.commitment));
    assert.equal(store.getWriteCount(), 2);

    const after = await service.status();
    assert.equal(after?.stage, Stage.SecondCommit);
    assert.equal(after?.players[0].address, ALICE);
    assert.equal(after?.escrow, 110n);
  });

  it("should not write when an operation is rejected", async () => {
    const { chain, store, service } = setup();
    await service.initialize(PARAMS);
    const alice = createPlayer(Choice.Rock, 1n, ALICE);

    await assert.rejects(
      chain.call(ALICE, 100n, (ctx) => service.commit(ctx, alice.commitment)),
      /InsufficientFunds/
    );
    assert.equal(store.getWriteCount(), 1);
    assert.equal(chain.balanceOf(ALICE), 1000n);
  });

  it("should play a round and record it in history", async () => {
    const { chain, history, service } = setup();
    await service.initialize(PARAMS);
    const alice = createPlayer(Choice.Paper, 1n, ALICE);
    const bob = createPlayer(Choice.Rock, 2n, BOB);

    await chain.call(ALICE, 110n, (ctx) => service.commit(ctx, alice.commitment));
    await chain.call(BOB, 110n, (ctx) => service.commit(ctx, bob.commitment));
    await chain.call(BOB, 0n, (ctx) => service.reveal(ctx, "rock", "2"));
    await chain.call(ALICE, 0n, (ctx) => service.reveal(ctx, "paper", "1"));
    const settlement = await chain.call(BOB, 0n, (ctx) => service.distribute(ctx));

    assert.equal(settlement.outcome, Outcome.FirstWins);
    assert.equal(chain.balanceOf(ALICE), 1100n);
    assert.equal(chain.balanceOf(BOB), 900n);

    assert.equal(history.recorded.length, 1);
    const [{ instance, event }] = history.recorded;
    assert.equal(instance, "table-1");
    assert.equal(event.round, 1);
    assert.deepEqual(event.players, [ALICE, BOB]);
    assert.deepEqual(event.choices, [Choice.Paper, Choice.Rock]);
    assert.equal(event.blockNumber, 50n);
  });

  it("should settle the round even when history fails", async () => {
    const { chain, history, service } = setup();
    history.fail = true;
    await service.initialize(PARAMS);
    const alice = createPlayer(Choice.Rock, 1n, ALICE);
    const bob = createPlayer(Choice.Rock, 2n, BOB);

    await chain.call(ALICE, 110n, (ctx) => service.commit(ctx, alice.commitment));
    await chain.call(BOB, 110n, (ctx) => service.commit(ctx, bob.commitment));
    await chain.call(ALICE, 0n, (ctx) => service.reveal(ctx, alice.choice, alice.blindingFactor));
    await chain.call(BOB, 0n, (ctx) => service.reveal(ctx, bob.choice, bob.blindingFactor));
    const settlement = await chain.call(BOB, 0n, (ctx) => service.distribute(ctx));

    assert.equal(settlement.outcome, Outcome.Draw);
    assert.equal((await service.status())?.round, 1);
  });

  it("should keep a loadable snapshot when the reveal window would overflow the deadline", async () => {
    const { chain, store, service } = setup();
    await service.initialize({ bet: 100n, deposit: 10n, revealWindow: MAX_UINT256 });
    const alice = createPlayer(Choice.Rock, 1n, ALICE);
    const bob = createPlayer(Choice.Paper, 2n, BOB);
    await chain.call(ALICE, 110n, (ctx) => service.commit(ctx, alice.commitment));
    await chain.call(BOB, 110n, (ctx) => service.commit(ctx, bob.commitment));
    const writes = store.getWriteCount();

    await assert.rejects(
      chain.call(ALICE, 0n, (ctx) => service.reveal(ctx, alice.choice, alice.blindingFactor)),
      /InvalidArgument: Reveal deadline overflows uint256/
    );
    assert.equal(store.getWriteCount(), writes);

    const status = await service.status();
    assert.equal(status?.stage, Stage.FirstReveal);
    assert.equal(status?.escrow, 220n);
    assert.equal(chain.balanceOf(chain.custody), 220n);
  });

  it("should run concurrent calls one at a time", async () => {
    const { service } = setup();
    await service.initialize(PARAMS);
    const alice = createPlayer(Choice.Rock, 1n, ALICE);
    const bob = createPlayer(Choice.Paper, 2n, BOB);

    // exact stakes stage no transfers, so the chain can stay out of it
    const slots = await Promise.all([
      service.commit({ caller: ALICE, value: 110n }, alice.commitment),
      service.commit({ caller: BOB, value: 110n }, bob.commitment),
    ]);
    assert.deepEqual(slots, [0, 1]);
    assert.equal((await service.status())?.stage, Stage.FirstReveal);
  });

  it("should gate administration on the configured operators", async () => {
    const { service } = setup();
    await service.initialize(PARAMS);

    await assert.rejects(service.lock({ caller: ALICE, value: 0n }), /Unauthorized/);
    assert.equal(await service.lock({ caller: OPERATOR, value: 0n }), true);

    const snapshot = await service.exportState({ caller: OPERATOR, value: 0n });
    const stored = await service.importState({ caller: OPERATOR, value: 0n }, snapshot);
    assert.equal(stored.digest, snapshot.digest);

    assert.equal(await service.unlock({ caller: OPERATOR, value: 0n }), false);
    assert.equal((await service.status())?.locked, false);
  });
});
