import { Wallet, randomBytes, toBigInt } from "ethers";
import { Choice, computeCommitment } from "@rpswager/core";

export interface TestPlayer {
  address: string;
  choice: Choice;
  blindingFactor: bigint;
  commitment: string;
}

/** 256 random bits, the size of a commitment's blinding factor. */
export function randomBlindingFactor(): bigint {
  return toBigInt(randomBytes(32));
}

/**
 * A throwaway account that has already picked its choice and computed the
 * matching commitment.
 */
export function createPlayer(
  choice: Choice,
  blindingFactor: bigint = randomBlindingFactor(),
  address: string = Wallet.createRandom().address
): TestPlayer {
  return {
    address,
    choice,
    blindingFactor,
    commitment: computeCommitment(choice, blindingFactor, address),
  };
}
