import {
  CallContext,
  Choice,
  GameEvent,
  GameSnapshot,
  RpsError,
  RpsErrorCode,
  Settlement,
  StateStore,
  isRpsError,
  toLogFields,
} from "@rpswager/core";
import {
  AdminControl,
  GameStatus,
  HostEnvironment,
  InitializeParams,
  OperationResult,
  RpsGame,
  deserializeState,
  operatorList,
  serializeState,
} from "@rpswager/engine";
import { RoundHistory } from "./RoundHistory";
import log from "../logger";

export interface GameServiceOptions {
  store: StateStore;
  host: HostEnvironment;
  /** Addresses allowed to lock, unlock, export and import */
  operators?: string[];
  history?: RoundHistory | null;
  /** Name used in logs and round history */
  instance?: string;
}

/**
 * Runs one deployed game instance on top of a snapshot store.
 *
 * Calls are queued so that exactly one operation is in flight: each loads the
 * stored snapshot, applies the operation, and writes the new snapshot back
 * only if the operation succeeded.
 */
export class GameService {
  private store: StateStore;
  private host: HostEnvironment;
  private admin: AdminControl;
  private history: RoundHistory | null;
  readonly instance: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: GameServiceOptions) {
    this.store = opts.store;
    this.host = opts.host;
    this.admin = new AdminControl(operatorList(opts.operators ?? []));
    this.history = opts.history ?? null;
    this.instance = opts.instance ?? "default";
  }

  async initialize(params: InitializeParams): Promise<GameStatus> {
    return this.serialize(async () => {
      if ((await this.store.read()) !== null) {
        throw new RpsError(RpsErrorCode.InvalidStage, `Instance "${this.instance}" is already initialized`);
      }

      const { value: game, events } = RpsGame.initialize(this.host, params, { admin: this.admin });
      await this.store.write(serializeState(game.getState()));
      await this.publish(events);
      return game.describe();
    });
  }

  /** Current status, or null before `initialize`. */
  async status(): Promise<GameStatus | null> {
    return this.serialize(async () => {
      const data = await this.store.read();
      if (data === null) {
        return null;
      }
      return this.restore(data).describe();
    });
  }

  commit(ctx: CallContext, commitment: string): Promise<number> {
    return this.execute("commit", ctx, (game) => game.commit(ctx, commitment));
  }

  reveal(ctx: CallContext, choice: unknown, blindingFactor: unknown): Promise<Choice> {
    return this.execute("reveal", ctx, (game) => game.reveal(ctx, choice, blindingFactor));
  }

  forceForfeit(ctx: CallContext): Promise<string> {
    return this.execute("forceForfeit", ctx, (game) => game.forceForfeit(ctx));
  }

  distribute(ctx: CallContext): Promise<Settlement> {
    return this.execute("distribute", ctx, (game) => game.distribute(ctx));
  }

  withdraw(ctx: CallContext): Promise<bigint> {
    return this.execute("withdraw", ctx, (game) => game.withdraw(ctx));
  }

  lock(ctx: CallContext): Promise<boolean> {
    return this.execute("lock", ctx, (game) => game.lock(ctx));
  }

  unlock(ctx: CallContext): Promise<boolean> {
    return this.execute("unlock", ctx, (game) => game.unlock(ctx));
  }

  exportState(ctx: CallContext): Promise<GameSnapshot> {
    return this.execute("exportState", ctx, (game) => game.exportState(ctx));
  }

  importState(ctx: CallContext, snapshot: unknown): Promise<GameSnapshot> {
    return this.execute("importState", ctx, (game) => game.importState(ctx, snapshot));
  }

  private execute<T>(
    operation: string,
    ctx: CallContext,
    body: (game: RpsGame) => OperationResult<T>
  ): Promise<T> {
    return this.serialize(async () => {
      const data = await this.store.read();
      if (data === null) {
        throw new RpsError(RpsErrorCode.InvalidStage, `Instance "${this.instance}" is not initialized`);
      }
      const game = this.restore(data);

      let result: OperationResult<T>;
      try {
        result = body(game);
      } catch (err) {
        if (isRpsError(err)) {
          log.warn(
            { instance: this.instance, operation, caller: ctx.caller, code: err.code },
            err.message
          );
        }
        throw err;
      }

      await this.store.write(serializeState(game.getState()));
      log.debug({ instance: this.instance, operation, caller: ctx.caller }, "Operation committed");
      await this.publish(result.events);
      return result.value;
    });
  }

  private restore(data: string): RpsGame {
    return new RpsGame(deserializeState(data), this.host, { admin: this.admin });
  }

  private async publish(events: GameEvent[]): Promise<void> {
    for (const event of events) {
      log.info({ instance: this.instance, ...toLogFields(event) }, event.type);

      if (event.type === "RoundSettled" && this.history) {
        try {
          await this.history.record(this.instance, event);
        } catch (err) {
          log.error(
            { instance: this.instance, round: event.round, err: err instanceof Error ? err.message : String(err) },
            "Failed to record round history"
          );
        }
      }
    }
  }

  /** Chain `task` behind every earlier call. */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the caller gets `run` and sees its rejection; the queue only needs to settle
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
