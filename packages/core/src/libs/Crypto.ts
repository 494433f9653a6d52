import { keccak256, solidityPackedKeccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";
import { Choice } from "../types/game";

/**
 * Hash an object using keccak256 after canonical encoding.
 */
export function hashState(state: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(state)));
}

/**
 * Commitment to a hidden choice: keccak256(abi.encodePacked(uint8 choice,
 * uint256 blindingFactor, address committer)).
 *
 * Binding the committer's address means a commitment observed in flight
 * cannot be replayed by another account. Throws if any argument is outside
 * its ABI type.
 */
export function computeCommitment(
  choice: Choice,
  blindingFactor: bigint,
  committer: string
): string {
  return solidityPackedKeccak256(
    ["uint8", "uint256", "address"],
    [choice, blindingFactor, committer]
  );
}
