import type { LocationCode } from "../../types/location";

export interface ToggleResult {
  selection: Set<LocationCode>;
  selected: boolean;
}

export const computeToggle = (code: LocationCode, selection: Set<LocationCode>): ToggleResult => {
  const next = new Set(selection);
  if (next.has(code)) {
    next.delete(code);
    return { selection: next, selected: false };
  }
  next.add(code);
  return { selection: next, selected: true };
};

export const computeClearSelection = (): Set<LocationCode> => {
  return new Set<LocationCode>();
};

/** Stable ordering for rendering hidden fields; the set itself is unordered. */
export const toFieldValues = (selection: Set<LocationCode>): LocationCode[] => {
  return Array.from(selection);
};
