import { strict as assert } from "assert";
import { keccak256, solidityPacked, toUtf8Bytes } from "ethers";
import { Choice } from "../types/game";
import { computeCommitment, hashState } from "./Crypto";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";

describe("computeCommitment", () => {
  it("should hash the packed choice, blinding factor and committer", () => {
    const packed = solidityPacked(["uint8", "uint256", "address"], [Choice.Scissors, 9n, ALICE]);
    // 1 byte choice + 32 bytes blinding + 20 bytes address
    assert.equal(packed.length, 2 + 2 * (1 + 32 + 20));
    assert.equal(computeCommitment(Choice.Scissors, 9n, ALICE), keccak256(packed));
  });

  it("should bind the commitment to the committer", () => {
    assert.notEqual(computeCommitment(Choice.Rock, 1n, ALICE), computeCommitment(Choice.Rock, 1n, BOB));
  });

  it("should throw for a blinding factor outside uint256", () => {
    assert.throws(() => computeCommitment(Choice.Rock, 1n << 256n, ALICE));
  });
});

describe("hashState", () => {
  it("should hash the canonical encoding", () => {
    assert.equal(hashState({ b: 2n, a: 1 }), keccak256(toUtf8Bytes('{"a":1,"b":"2"}')));
    assert.equal(hashState({ a: 1, b: 2n }), hashState({ b: 2n, a: 1 }));
  });
});
