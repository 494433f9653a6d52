import {
  CallContext,
  Choice,
  GameEvent,
  GameSnapshot,
  GameState,
  MAX_UINT256,
  RpsError,
  RpsErrorCode,
  STAGE_NAMES,
  Settlement,
  Stage,
  isBytes32,
  normalizeAddress,
  parseUint256,
} from "@rpswager/core";
import { HostEnvironment } from "./interfaces/IHost";
import { EscrowLedger } from "./EscrowLedger";
import { AdminControl } from "./AdminControl";
import { isPlayable, parseChoice } from "./choice";
import { verifyCommitment } from "./verifier";
import { settle } from "./resolution";
import { cloneState } from "./snapshot";

export interface InitializeParams {
  bet: unknown;
  deposit: unknown;
  revealWindow: unknown;
}

export interface RpsGameOptions {
  /** Gate for lock/unlock/export/import. Defaults to denying everyone. */
  admin?: AdminControl;
}

export interface OperationResult<T> {
  value: T;
  events: GameEvent[];
}

/** Mutable view handed to an operation body. */
export interface Transaction {
  state: GameState;
  ledger: EscrowLedger;
  events: GameEvent[];
}

export interface PlayerStatus {
  slot: number;
  address: string;
  commitment: string;
  revealed: boolean;
  choice: Choice;
  balance: bigint;
}

export interface GameStatus {
  stage: Stage;
  stageName: string;
  locked: boolean;
  round: number;
  bet: bigint;
  deposit: bigint;
  revealWindow: bigint;
  revealDeadline: bigint;
  blockNumber: bigint;
  deadlinePassed: boolean;
  players: PlayerStatus[];
  escrow: bigint;
}

/**
 * The commit-reveal state machine for one deployment.
 *
 * Every operation runs against a draft copy of the state. The draft, and the
 * batch of transfers its ledger staged, are committed together only when the
 * body returns and the host accepts the batch; any throw leaves the game as
 * it was.
 */
export class RpsGame {
  private state: GameState;
  private host: HostEnvironment;
  private admin: AdminControl;

  constructor(state: GameState, host: HostEnvironment, opts: RpsGameOptions = {}) {
    this.state = cloneState(state);
    this.host = host;
    this.admin = opts.admin ?? new AdminControl(() => false);
  }

  /**
   * Create a fresh instance: stage FirstCommit, unlocked, empty ledger.
   */
  static initialize(
    host: HostEnvironment,
    params: InitializeParams,
    opts: RpsGameOptions = {}
  ): OperationResult<RpsGame> {
    const bet = requireUint(params.bet, "bet");
    const deposit = requireUint(params.deposit, "deposit");
    const revealWindow = requireUint(params.revealWindow, "revealWindow");

    // the whole pot must stay representable
    if (2n * (bet + deposit) > MAX_UINT256) {
      throw new RpsError(RpsErrorCode.InvalidArgument, "bet + deposit overflows the pot");
    }

    const game = new RpsGame(
      {
        config: { bet, deposit, revealWindow },
        stage: Stage.FirstCommit,
        locked: false,
        revealDeadline: 0n,
        round: 0,
        slots: [],
        balances: new Map(),
      },
      host,
      opts
    );

    return {
      value: game,
      events: [{ type: "Initialized", bet, deposit, revealWindow }],
    };
  }

  /** Copy of the committed state. */
  getState(): GameState {
    return cloneState(this.state);
  }

  /** Amount each player must attach to `commit`. */
  getStake(): bigint {
    return this.state.config.bet + this.state.config.deposit;
  }

  describe(): GameStatus {
    const { config, slots, stage } = this.state;
    const ledger = new EscrowLedger(new Map(this.state.balances));
    const blockNumber = this.host.blockNumber();

    return {
      stage,
      stageName: STAGE_NAMES[stage],
      locked: this.state.locked,
      round: this.state.round,
      bet: config.bet,
      deposit: config.deposit,
      revealWindow: config.revealWindow,
      revealDeadline: this.state.revealDeadline,
      blockNumber,
      deadlinePassed: this.state.revealDeadline !== 0n && blockNumber > this.state.revealDeadline,
      players: slots.map((slot, i) => ({
        slot: i,
        address: slot.address,
        commitment: slot.commitment,
        revealed: slot.revealedChoice !== Choice.None,
        choice: slot.revealedChoice,
        balance: ledger.balanceOf(slot.address),
      })),
      escrow: ledger.totalHeld(),
    };
  }

  /**
   * Take a slot with a hidden commitment. `ctx.value` must cover bet +
   * deposit; any excess goes straight back to the caller.
   * Returns the slot index taken.
   */
  commit(ctx: CallContext, commitment: string): OperationResult<number> {
    return this.transact(RpsErrorCode.TransferFailed, ({ state, ledger, events }) => {
      assertUnlocked(state);
      if (state.stage !== Stage.FirstCommit && state.stage !== Stage.SecondCommit) {
        throw stageError("commit", state.stage);
      }

      const caller = normalizeAddress(ctx.caller);
      if (!caller) {
        throw new RpsError(RpsErrorCode.InvalidArgument, `Caller is not an address: ${ctx.caller}`);
      }
      if (!isBytes32(commitment)) {
        throw new RpsError(RpsErrorCode.InvalidCommitment, "Commitment must be a 32-byte hex hash");
      }
      if (state.stage === Stage.SecondCommit && state.slots[0].address === caller) {
        throw new RpsError(RpsErrorCode.DuplicatePlayer, `${caller} already holds slot 0`);
      }

      const stake = state.config.bet + state.config.deposit;
      if (ctx.value < stake) {
        throw new RpsError(
          RpsErrorCode.InsufficientFunds,
          `Commit requires ${stake}, received ${ctx.value}`
        );
      }

      ledger.deposit(caller, ctx.value);
      const excess = ctx.value - stake;
      if (excess > 0n) {
        ledger.payout(caller, excess);
        events.push({ type: "Refunded", player: caller, amount: excess });
      }

      const slot = state.slots.length;
      state.slots.push({
        address: caller,
        commitment: commitment.toLowerCase(),
        revealedChoice: Choice.None,
      });
      state.stage = state.stage === Stage.FirstCommit ? Stage.SecondCommit : Stage.FirstReveal;

      events.push({ type: "Committed", player: caller, slot, commitment: commitment.toLowerCase(), stage: state.stage });
      return slot;
    });
  }

  /**
   * Open the caller's commitment. The first reveal arms the deadline for the
   * second; the second moves the game to Distribute.
   */
  reveal(ctx: CallContext, choice: unknown, blindingFactor: unknown): OperationResult<Choice> {
    return this.transact(RpsErrorCode.TransferFailed, ({ state, events }) => {
      assertUnlocked(state);
      assertNoValue(ctx, "reveal");
      if (state.stage !== Stage.FirstReveal && state.stage !== Stage.SecondReveal) {
        throw stageError("reveal", state.stage);
      }

      const parsed = parseChoice(choice);
      if (!isPlayable(parsed)) {
        throw new RpsError(RpsErrorCode.InvalidChoice, "Reveal must be rock, paper or scissors");
      }

      const caller = normalizeAddress(ctx.caller);
      const index = caller ? state.slots.findIndex((s) => s.address === caller) : -1;
      if (!caller || index < 0) {
        throw new RpsError(RpsErrorCode.UnknownPlayer, `${ctx.caller} holds no slot`);
      }

      const slot = state.slots[index];
      if (slot.revealedChoice !== Choice.None) {
        throw new RpsError(RpsErrorCode.InvalidStage, `${caller} has already revealed`);
      }
      if (state.stage === Stage.SecondReveal && this.host.blockNumber() > state.revealDeadline) {
        throw new RpsError(
          RpsErrorCode.InvalidStage,
          `Reveal deadline ${state.revealDeadline} has passed`
        );
      }

      const blinding = parseUint256(blindingFactor);
      if (blinding === null || !verifyCommitment(slot.commitment, parsed, blinding, caller)) {
        throw new RpsError(RpsErrorCode.InvalidCommitment, "Reveal does not match the commitment");
      }

      slot.revealedChoice = parsed;
      if (state.stage === Stage.FirstReveal) {
        const deadline = this.host.blockNumber() + state.config.revealWindow;
        if (deadline > MAX_UINT256) {
          throw new RpsError(RpsErrorCode.InvalidArgument, "Reveal deadline overflows uint256");
        }
        state.revealDeadline = deadline;
        state.stage = Stage.SecondReveal;
      } else {
        state.stage = Stage.Distribute;
      }

      events.push({
        type: "Revealed",
        player: caller,
        slot: index,
        choice: parsed,
        revealDeadline: state.revealDeadline,
      });
      return parsed;
    });
  }

  /**
   * After the deadline, anyone may close the reveal phase. The player who
   * did not reveal keeps `None` and loses by forfeit.
   * Returns the forfeiting address.
   */
  forceForfeit(ctx: CallContext): OperationResult<string> {
    return this.transact(RpsErrorCode.TransferFailed, ({ state, events }) => {
      assertUnlocked(state);
      assertNoValue(ctx, "forceForfeit");
      if (state.stage !== Stage.SecondReveal) {
        throw stageError("forceForfeit", state.stage);
      }

      const height = this.host.blockNumber();
      if (height <= state.revealDeadline) {
        throw new RpsError(
          RpsErrorCode.InvalidStage,
          `Reveal deadline ${state.revealDeadline} has not passed (block ${height})`
        );
      }

      const index = state.slots.findIndex((s) => s.revealedChoice === Choice.None);
      if (index < 0) {
        throw new RpsError(RpsErrorCode.InvalidStage, "No unrevealed player to forfeit");
      }

      const loser = state.slots[index].address;
      state.stage = Stage.Distribute;

      events.push({ type: "Forfeited", player: loser, slot: index, calledBy: ctx.caller });
      return loser;
    });
  }

  /**
   * Resolve the round and pay it out in one atomic batch, then reset for the
   * next round. If the host refuses any transfer nothing changes and the
   * call may be retried.
   */
  distribute(ctx: CallContext): OperationResult<Settlement> {
    return this.transact(RpsErrorCode.DistributeFailed, ({ state, ledger, events }) => {
      assertUnlocked(state);
      assertNoValue(ctx, "distribute");
      if (state.stage !== Stage.Distribute) {
        throw stageError("distribute", state.stage);
      }
      if (state.slots.length !== 2) {
        throw new RpsError(RpsErrorCode.InvalidStage, `Distribute needs two players, found ${state.slots.length}`);
      }

      const [first, second] = state.slots;
      const players: [string, string] = [first.address, second.address];
      const choices: [Choice, Choice] = [first.revealedChoice, second.revealedChoice];
      const { bet, deposit } = state.config;
      const settlement = settle(choices, bet, deposit);

      // move both stakes into the pool, then credit each share back
      for (const player of players) {
        ledger.debit(player, bet + deposit);
      }
      players.forEach((player, i) => {
        ledger.deposit(player, settlement.payouts[i] + settlement.retained[i]);
      });
      players.forEach((player, i) => {
        const amount = settlement.payouts[i];
        if (amount > 0n) {
          ledger.payout(player, amount);
          events.push({ type: "Payout", player, amount });
        }
      });

      events.push({
        type: "RoundSettled",
        round: state.round + 1,
        outcome: settlement.outcome,
        forfeit: settlement.forfeit,
        players,
        choices,
        payouts: settlement.payouts,
        retained: settlement.retained,
        blockNumber: this.host.blockNumber(),
      });

      state.slots = [];
      state.revealDeadline = 0n;
      state.round += 1;
      state.stage = Stage.FirstCommit;
      return settlement;
    });
  }

  /**
   * Pay out whatever the caller holds beyond the stake locked in the current
   * round (leftovers from forfeits and void rounds).
   */
  withdraw(ctx: CallContext): OperationResult<bigint> {
    return this.transact(RpsErrorCode.TransferFailed, ({ state, ledger, events }) => {
      assertUnlocked(state);
      assertNoValue(ctx, "withdraw");

      const caller = normalizeAddress(ctx.caller);
      if (!caller) {
        throw new RpsError(RpsErrorCode.InvalidArgument, `Caller is not an address: ${ctx.caller}`);
      }

      const inRound = state.slots.some((s) => s.address === caller);
      const lockedStake = inRound ? state.config.bet + state.config.deposit : 0n;
      const available = ledger.balanceOf(caller) - lockedStake;
      if (available <= 0n) {
        throw new RpsError(RpsErrorCode.InsufficientFunds, `${caller} has nothing to withdraw`);
      }

      ledger.payout(caller, available);
      events.push({ type: "Withdrawn", player: caller, amount: available });
      return available;
    });
  }

  lock(ctx: CallContext): OperationResult<boolean> {
    return this.transact(RpsErrorCode.TransferFailed, (tx) => this.admin.setLocked(tx, ctx, true));
  }

  unlock(ctx: CallContext): OperationResult<boolean> {
    return this.transact(RpsErrorCode.TransferFailed, (tx) => this.admin.setLocked(tx, ctx, false));
  }

  exportState(ctx: CallContext): OperationResult<GameSnapshot> {
    return this.transact(RpsErrorCode.TransferFailed, (tx) => this.admin.exportState(tx, ctx));
  }

  importState(ctx: CallContext, snapshot: unknown): OperationResult<GameSnapshot> {
    return this.transact(RpsErrorCode.TransferFailed, (tx) => this.admin.importState(tx, ctx, snapshot));
  }

  private transact<T>(
    onRejected: RpsErrorCode.TransferFailed | RpsErrorCode.DistributeFailed,
    body: (tx: Transaction) => T
  ): OperationResult<T> {
    const draft = cloneState(this.state);
    const tx: Transaction = {
      state: draft,
      ledger: new EscrowLedger(draft.balances),
      events: [],
    };

    const value = body(tx);

    const transfers = tx.ledger.pendingTransfers();
    if (transfers.length > 0) {
      try {
        this.host.transfer(transfers);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new RpsError(onRejected, reason, { cause: err });
      }
    }

    this.state = tx.state;
    return { value, events: tx.events };
  }
}

function assertUnlocked(state: GameState): void {
  if (state.locked) {
    throw new RpsError(RpsErrorCode.Locked, "Game is locked");
  }
}

function assertNoValue(ctx: CallContext, operation: string): void {
  if (ctx.value !== 0n) {
    throw new RpsError(RpsErrorCode.InvalidArgument, `${operation} does not accept value`);
  }
}

function stageError(operation: string, stage: Stage): RpsError {
  return new RpsError(
    RpsErrorCode.InvalidStage,
    `Cannot ${operation} during ${STAGE_NAMES[stage]}`
  );
}

function requireUint(value: unknown, field: string): bigint {
  const parsed = parseUint256(value);
  if (parsed === null) {
    throw new RpsError(RpsErrorCode.InvalidArgument, `${field} must be a uint256`);
  }
  return parsed;
}
