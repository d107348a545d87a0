import { describe, expect, it } from "vitest";
import { isNone, isSome, mapOption, none, some, unwrapOption } from "../../../src/command/option";

describe("Option", () => {
  it("should tell present and absent values apart", () => {
    expect(isSome(some(0))).toBe(true);
    expect(isNone(some(0))).toBe(false);
    expect(isNone(none())).toBe(true);
  });

  it("should keep a present null", () => {
    expect(some(null)).toEqual({ kind: "some", value: null });
  });

  it("should unwrap with a fallback", () => {
    expect(unwrapOption(some(3), 0)).toBe(3);
    expect(unwrapOption(none<number>(), 0)).toBe(0);
    expect(unwrapOption(none<number>())).toBeUndefined();
  });

  it("should map only present values", () => {
    expect(mapOption(some(2), (value) => value * 10)).toEqual({ kind: "some", value: 20 });
    expect(mapOption(none<number>(), (value) => value * 10)).toEqual({ kind: "none" });
  });
});
