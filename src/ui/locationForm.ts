import {
  LOCATION_MODE_FIELD,
  LOCATIONS_FIELD,
  type LocationCode,
  type LocationMode,
} from "../types/location";

export interface LocationSubmission {
  mode: LocationMode;
  locations: LocationCode[];
}

export const AMENITY_FIELD = "amenity";
export const AMENITY_FEATURE_PREFIX = "Amenity_";
const NUMERIC_FEATURE_FIELDS = ["beds", "baths", "sqft"] as const;

const toFormData = (source: HTMLFormElement | FormData): FormData =>
  source instanceof FormData ? source : new FormData(source);

/**
 * Reads what the picker hands to form submission: the active mode and every
 * `locations` value, de-duplicated in document order.
 */
export const readLocationSubmission = (source: HTMLFormElement | FormData): LocationSubmission => {
  const data = toFormData(source);
  const mode: LocationMode = data.get(LOCATION_MODE_FIELD) === "map" ? "map" : "list";
  const seen = new Set<LocationCode>();
  for (const value of data.getAll(LOCATIONS_FIELD)) {
    if (typeof value !== "string") continue;
    const code = value.trim();
    if (code) seen.add(code);
  }
  return { mode, locations: Array.from(seen) };
};

/**
 * Collects listing features for the rent estimate. Blank or non-numeric
 * numeric fields are left out; checked amenities become `Amenity_<name>: 1`.
 */
export const readListingFeatures = (source: HTMLFormElement | FormData): Record<string, number> => {
  const data = toFormData(source);
  const features: Record<string, number> = {};

  for (const field of NUMERIC_FEATURE_FIELDS) {
    const raw = data.get(field);
    if (typeof raw !== "string" || raw.trim() === "") continue;
    const value = Number(raw);
    if (Number.isFinite(value)) features[field] = value;
  }

  for (const amenity of data.getAll(AMENITY_FIELD)) {
    if (typeof amenity !== "string" || !amenity.trim()) continue;
    features[`${AMENITY_FEATURE_PREFIX}${amenity.trim()}`] = 1;
  }

  return features;
};
