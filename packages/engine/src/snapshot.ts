import {
  Choice,
  GameSnapshot,
  GameState,
  PlayerSlot,
  RpsError,
  RpsErrorCode,
  SNAPSHOT_VERSION,
  Stage,
  UnsignedSnapshot,
  hashState,
  isBytes32,
  normalizeAddress,
  parseUint256,
} from "@rpswager/core";

/** Deep copy; operations mutate a clone and swap it in on success. */
export function cloneState(state: GameState): GameState {
  return {
    config: { ...state.config },
    stage: state.stage,
    locked: state.locked,
    revealDeadline: state.revealDeadline,
    round: state.round,
    slots: state.slots.map((slot) => ({ ...slot })),
    balances: new Map(state.balances),
  };
}

export function toSnapshot(state: GameState): GameSnapshot {
  const unsigned: UnsignedSnapshot = {
    version: SNAPSHOT_VERSION,
    bet: state.config.bet.toString(),
    deposit: state.config.deposit.toString(),
    revealWindow: state.config.revealWindow.toString(),
    revealDeadline: state.revealDeadline.toString(),
    stage: state.stage,
    locked: state.locked,
    round: state.round,
    slots: state.slots.map((slot) => ({
      address: slot.address,
      commitment: slot.commitment,
      revealedChoice: slot.revealedChoice,
    })),
    balances: Object.fromEntries(
      [...state.balances].map(([address, amount]) => [address, amount.toString()])
    ),
  };
  return { ...unsigned, digest: hashState(unsigned) };
}

export function serializeState(state: GameState): string {
  return JSON.stringify(toSnapshot(state));
}

export function deserializeState(data: string): GameState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new RpsError(RpsErrorCode.InvalidSnapshot, "Snapshot is not valid JSON", { cause: err });
  }
  return fromSnapshot(parsed);
}

/**
 * Validate an untrusted snapshot and rebuild the state it describes.
 * Checks shape, ranges, the digest, and that slots, reveals, deadline and
 * escrow agree with the stage.
 */
export function fromSnapshot(input: unknown): GameState {
  if (!isRecord(input)) {
    invalid("snapshot must be an object");
  }
  if (input.version !== SNAPSHOT_VERSION) {
    invalid(`unsupported version ${String(input.version)}`);
  }

  const bet = uint(input.bet, "bet");
  const deposit = uint(input.deposit, "deposit");
  const revealWindow = uint(input.revealWindow, "revealWindow");
  const revealDeadline = uint(input.revealDeadline, "revealDeadline");

  const stage = input.stage;
  if (typeof stage !== "number" || !Number.isInteger(stage) || stage < Stage.FirstCommit || stage > Stage.Distribute) {
    invalid(`stage out of range: ${String(stage)}`);
  }
  if (typeof input.locked !== "boolean") {
    invalid("locked must be a boolean");
  }
  const round = input.round;
  if (typeof round !== "number" || !Number.isSafeInteger(round) || round < 0) {
    invalid("round must be a non-negative integer");
  }

  const slots = parseSlots(input.slots);
  const balances = parseBalances(input.balances);

  if (typeof input.digest !== "string") {
    invalid("missing digest");
  }
  const { digest, ...unsigned } = input;
  if (hashState(unsigned) !== digest) {
    invalid("digest does not match contents");
  }

  const state: GameState = {
    config: { bet, deposit, revealWindow },
    stage,
    locked: input.locked,
    revealDeadline,
    round,
    slots,
    balances,
  };
  checkConsistency(state);
  return state;
}

function parseSlots(raw: unknown): PlayerSlot[] {
  if (!Array.isArray(raw)) {
    invalid("slots must be an array");
  }
  if (raw.length > 2) {
    invalid(`too many slots: ${raw.length}`);
  }

  const slots: PlayerSlot[] = [];
  for (const [i, entry] of raw.entries()) {
    if (!isRecord(entry)) {
      invalid(`slot ${i} must be an object`);
    }
    const address = typeof entry.address === "string" ? normalizeAddress(entry.address) : null;
    if (!address) {
      invalid(`slot ${i} has no valid address`);
    }
    if (typeof entry.commitment !== "string" || !isBytes32(entry.commitment)) {
      invalid(`slot ${i} has no valid commitment`);
    }
    const choice = entry.revealedChoice;
    if (typeof choice !== "number" || !Number.isInteger(choice) || choice < Choice.None || choice > Choice.Scissors) {
      invalid(`slot ${i} choice out of range: ${String(choice)}`);
    }
    slots.push({ address, commitment: entry.commitment.toLowerCase(), revealedChoice: choice });
  }

  if (slots.length === 2 && slots[0].address === slots[1].address) {
    invalid("both slots hold the same address");
  }
  return slots;
}

function parseBalances(raw: unknown): Map<string, bigint> {
  if (!isRecord(raw)) {
    invalid("balances must be an object");
  }
  const balances = new Map<string, bigint>();
  for (const [key, value] of Object.entries(raw)) {
    const address = normalizeAddress(key);
    if (!address) {
      invalid(`balance key is not an address: ${key}`);
    }
    if (balances.has(address)) {
      invalid(`duplicate balance entry for ${address}`);
    }
    balances.set(address, uint(value, `balance of ${address}`));
  }
  return balances;
}

const EXPECTED_SLOTS: Record<Stage, number> = {
  [Stage.FirstCommit]: 0,
  [Stage.SecondCommit]: 1,
  [Stage.FirstReveal]: 2,
  [Stage.SecondReveal]: 2,
  [Stage.Distribute]: 2,
};

function checkConsistency(state: GameState): void {
  const { stage, slots, revealDeadline, config } = state;

  if (slots.length !== EXPECTED_SLOTS[stage]) {
    invalid(`stage ${stage} expects ${EXPECTED_SLOTS[stage]} slots, found ${slots.length}`);
  }

  const revealed = slots.filter((slot) => slot.revealedChoice !== Choice.None).length;
  if (stage <= Stage.FirstReveal && revealed !== 0) {
    invalid("choices revealed before the reveal phase");
  }
  if (stage === Stage.SecondReveal && revealed !== 1) {
    invalid("second reveal stage needs exactly one revealed choice");
  }

  if (stage === Stage.SecondReveal && revealDeadline === 0n) {
    invalid("second reveal stage needs an armed deadline");
  }
  if (stage < Stage.SecondReveal && revealDeadline !== 0n) {
    invalid("deadline armed before the first reveal");
  }

  const stake = config.bet + config.deposit;
  for (const slot of slots) {
    const held = state.balances.get(slot.address) ?? 0n;
    if (held < stake) {
      invalid(`escrow for ${slot.address} is ${held}, stake is ${stake}`);
    }
  }
}

function uint(value: unknown, field: string): bigint {
  const parsed = typeof value === "string" ? parseUint256(value) : null;
  if (parsed === null) {
    invalid(`${field} must be a uint256 decimal string`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(reason: string): never {
  throw new RpsError(RpsErrorCode.InvalidSnapshot, reason);
}
