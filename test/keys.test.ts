import {
  compareInt,
  compareString,
  hashInt,
  hashString,
} from "../src/index.js";
import { test, expect, describe } from "@jest/globals";

describe("integer keys", () => {
  test("hash is the identity", () => {
    expect(hashInt(0)).toEqual(0);
    expect(hashInt(7)).toEqual(7);
  });

  test("comparison is zero only for equal integers", () => {
    expect(compareInt(4, 4)).toEqual(0);
    expect(compareInt(1, 4)).toEqual(-3);
    expect(compareInt(4, 1)).toEqual(3);
  });
});

describe("string keys", () => {
  test("hash of the empty string is the seed", () => {
    expect(hashString("")).toEqual(5381);
  });

  test("hash mixes in each code unit", () => {
    expect(hashString("a")).toEqual(177604);
    expect(hashString("ab")).not.toEqual(hashString("ba"));
  });

  test("hash stays an unsigned 32-bit integer", () => {
    const h = hashString("the quick brown fox jumped over the lazy dog");

    expect(Number.isInteger(h)).toEqual(true);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThan(2 ** 32);
  });

  test("comparison orders like strcmp", () => {
    expect(compareString("hello", "hello")).toEqual(0);
    expect(compareString("a", "b")).toEqual(-1);
    expect(compareString("b", "a")).toEqual(1);
  });
});
