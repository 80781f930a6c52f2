import { describe, it, expect } from "vitest";
import { formatRent } from "./format";

describe("formatRent", () => {
  it("rounds to whole dollars with grouping", () => {
    expect(formatRent(2744.6)).toBe("$2,745/mo");
    expect(formatRent(980)).toBe("$980/mo");
  });

  it("returns empty string for non-finite values", () => {
    expect(formatRent(NaN)).toBe("");
    expect(formatRent(Infinity)).toBe("");
  });
});
