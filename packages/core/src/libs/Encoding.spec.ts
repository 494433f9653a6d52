import { strict as assert } from "assert";
import { canonicalEncode, toLogFields } from "./Encoding";

describe("canonicalEncode", () => {
  it("should sort keys at every level", () => {
    assert.equal(canonicalEncode({ b: 1, a: { d: 2, c: 3 } }), '{"a":{"c":3,"d":2},"b":1}');
  });

  it("should write bigints as strings, maps as objects and drop undefined", () => {
    const value = {
      b: 1n,
      a: undefined,
      c: new Map([
        ["y", 2n],
        ["x", 1n],
      ]),
    };
    assert.equal(canonicalEncode(value), '{"b":"1","c":{"x":"1","y":"2"}}');
  });

  it("should keep array order", () => {
    assert.equal(canonicalEncode([3n, { z: 1, y: 2 }]), '["3",{"y":2,"z":1}]');
  });
});

describe("toLogFields", () => {
  it("should stringify top-level bigints and bigint arrays", () => {
    assert.deepEqual(
      toLogFields({ type: "Payout", amount: 5n, payouts: [1n, 2n], players: ["a", "b"] }),
      { type: "Payout", amount: "5", payouts: ["1", "2"], players: ["a", "b"] }
    );
  });
});
