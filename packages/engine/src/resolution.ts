import { Choice, Outcome, Settlement } from "@rpswager/core";
import { PlayableChoice } from "./choice";

/** What each choice defeats. */
const BEATS: Record<PlayableChoice, PlayableChoice> = {
  [Choice.Rock]: Choice.Scissors,
  [Choice.Scissors]: Choice.Paper,
  [Choice.Paper]: Choice.Rock,
};

/**
 * Decide a round from the two slots' choices. A `None` choice means that
 * player never revealed and loses by forfeit; if neither revealed the round
 * is `Invalid`.
 */
export function resolve(first: Choice, second: Choice): Outcome {
  if (first === Choice.None && second === Choice.None) {
    return Outcome.Invalid;
  }
  if (first === Choice.None) {
    return Outcome.SecondWins;
  }
  if (second === Choice.None) {
    return Outcome.FirstWins;
  }
  if (first === second) {
    return Outcome.Draw;
  }
  return BEATS[first] === second ? Outcome.FirstWins : Outcome.SecondWins;
}

/**
 * Split the pool of 2 * (bet + deposit) between the two slots.
 *
 * - win: winner gets both bets and their deposit, loser gets their deposit
 * - forfeit: winner is paid both bets and one deposit; their own deposit
 *   stays on their ledger balance; the non-revealer gets nothing
 * - draw: each gets bet + deposit
 * - invalid: each gets their deposit; each bet stays on its owner's balance
 */
export function settle(
  choices: [Choice, Choice],
  bet: bigint,
  deposit: bigint
): Settlement {
  const outcome = resolve(choices[0], choices[1]);
  const forfeit =
    (outcome === Outcome.FirstWins || outcome === Outcome.SecondWins) &&
    choices.includes(Choice.None);

  switch (outcome) {
    case Outcome.Draw:
      return {
        outcome,
        forfeit,
        payouts: [bet + deposit, bet + deposit],
        retained: [0n, 0n],
      };

    case Outcome.Invalid:
      return {
        outcome,
        forfeit,
        payouts: [deposit, deposit],
        retained: [bet, bet],
      };

    case Outcome.FirstWins:
    case Outcome.SecondWins: {
      const winner = outcome === Outcome.FirstWins ? 0 : 1;
      const payouts: [bigint, bigint] = [0n, 0n];
      const retained: [bigint, bigint] = [0n, 0n];

      payouts[winner] = 2n * bet + deposit;
      if (forfeit) {
        retained[winner] = deposit;
      } else {
        payouts[1 - winner] = deposit;
      }
      return { outcome, forfeit, payouts, retained };
    }
  }
}
