import { describe, expect, test } from "vitest";
import { sequentializeKey } from "./telegram-bot";

describe("sequentializeKey", () => {
  test("keys updates by sender", () => {
    expect(sequentializeKey({ from: { id: 42 } })).toBe("42");
  });

  test("updates without a sender are not sequentialized", () => {
    expect(sequentializeKey({})).toBeUndefined();
  });
});
