import { Choice, RpsError, RpsErrorCode } from "@rpswager/core";

export type PlayableChoice = Choice.Rock | Choice.Paper | Choice.Scissors;

const BY_NAME = new Map<string, Choice>([
  ["none", Choice.None],
  ["rock", Choice.Rock],
  ["paper", Choice.Paper],
  ["scissors", Choice.Scissors],
]);

/**
 * Total conversion from wire input to a Choice. Accepts the numeric encoding
 * (0-3, as number, bigint or decimal string) or a case-insensitive name.
 */
export function parseChoice(raw: unknown): Choice {
  if (typeof raw === "string") {
    const named = BY_NAME.get(raw.trim().toLowerCase());
    if (named !== undefined) {
      return named;
    }
    if (/^[0-9]+$/.test(raw)) {
      return parseChoice(Number(raw));
    }
  }
  if (typeof raw === "bigint" && raw >= 0n && raw <= 3n) {
    return parseChoice(Number(raw));
  }
  if (typeof raw === "number" && Number.isInteger(raw) && raw >= 0 && raw <= 3) {
    return raw;
  }
  throw new RpsError(RpsErrorCode.InvalidChoice, `Unrecognised choice: ${String(raw)}`);
}

export function isPlayable(choice: Choice): choice is PlayableChoice {
  return choice === Choice.Rock || choice === Choice.Paper || choice === Choice.Scissors;
}
