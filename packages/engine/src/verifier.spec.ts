import { strict as assert } from "assert";
import { Choice, computeCommitment } from "@rpswager/core";
import { verifyCommitment } from "./verifier";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";

describe("verifyCommitment", () => {
  const commitment = computeCommitment(Choice.Paper, 42n, ALICE);

  it("should accept the matching opening", () => {
    assert.equal(verifyCommitment(commitment, Choice.Paper, 42n, ALICE), true);
  });

  it("should ignore hex case of the stored commitment", () => {
    const upper = "0x" + commitment.slice(2).toUpperCase();
    assert.equal(verifyCommitment(upper, Choice.Paper, 42n, ALICE), true);
  });

  it("should reject a different choice, blinding factor or committer", () => {
    assert.equal(verifyCommitment(commitment, Choice.Rock, 42n, ALICE), false);
    assert.equal(verifyCommitment(commitment, Choice.Paper, 43n, ALICE), false);
    assert.equal(verifyCommitment(commitment, Choice.Paper, 42n, BOB), false);
  });

  it("should return false instead of throwing on malformed input", () => {
    assert.equal(verifyCommitment("0x1234", Choice.Paper, 42n, ALICE), false);
    assert.equal(verifyCommitment(commitment, Choice.Paper, -1n, ALICE), false);
    assert.equal(verifyCommitment(commitment, Choice.Paper, 1n << 256n, ALICE), false);
    assert.equal(verifyCommitment(commitment, Choice.Paper, 42n, "0xnothex"), false);
  });
});
