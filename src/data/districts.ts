import type { District } from "../types/location";

export const BOSTON_DISTRICTS: District[] = [
  { code: "allston", label: "Allston", coordinates: [42.353, -71.132] },
  { code: "brighton", label: "Brighton", coordinates: [42.347, -71.15] },
  { code: "fenway", label: "Fenway / Kenmore", coordinates: [42.347, -71.097] },
  { code: "back_bay", label: "Back Bay", coordinates: [42.35, -71.081] },
];
