import { describe, it, expect } from "vitest";
import { computeClearSelection, computeToggle, toFieldValues } from "./locationSelection";

const S = (arr: string[]) => new Set(arr);

describe("locationSelection helpers", () => {
  it("computeToggle adds an unselected code", () => {
    const { selection, selected } = computeToggle("allston", S([]));
    expect([...selection]).toEqual(["allston"]);
    expect(selected).toBe(true);
  });

  it("computeToggle removes a selected code", () => {
    const { selection, selected } = computeToggle("allston", S(["allston", "fenway"]));
    expect([...selection]).toEqual(["fenway"]);
    expect(selected).toBe(false);
  });

  it("computeToggle twice restores the original selection", () => {
    const start = S(["brighton"]);
    const once = computeToggle("fenway", start);
    const twice = computeToggle("fenway", once.selection);
    expect([...twice.selection]).toEqual(["brighton"]);
  });

  it("computeToggle leaves the input set untouched", () => {
    const start = S(["allston"]);
    computeToggle("allston", start);
    expect([...start]).toEqual(["allston"]);
  });

  it("computeClearSelection returns empty set", () => {
    expect(computeClearSelection().size).toBe(0);
  });

  it("toFieldValues keeps insertion order", () => {
    expect(toFieldValues(S(["fenway", "allston"]))).toEqual(["fenway", "allston"]);
  });
});
