import { Choice, computeCommitment, isBytes32 } from "@rpswager/core";

/**
 * Accept a reveal only if it reproduces the stored commitment for this
 * committer. Never throws: malformed input is a mismatch.
 */
export function verifyCommitment(
  commitment: string,
  choice: Choice,
  blindingFactor: bigint,
  committer: string
): boolean {
  if (!isBytes32(commitment)) {
    return false;
  }

  let expected: string;
  try {
    expected = computeCommitment(choice, blindingFactor, committer);
  } catch {
    // out-of-range blinding factor or malformed address
    return false;
  }

  return expected.toLowerCase() === commitment.toLowerCase();
}
