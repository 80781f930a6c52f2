export type LocationCode = string;

export type LocationMode = "list" | "map";

export const isLocationMode = (value: unknown): value is LocationMode =>
  value === "list" || value === "map";

export interface District {
  code: LocationCode;
  label: string;
  /** [latitude, longitude] */
  coordinates: [number, number];
}

export interface MarkerStyle {
  radius: number;
  strokeColor: string;
  strokeWeight: number;
  fillColor: string;
  fillOpacity: number;
}

/** Form field name shared by list checkboxes and map-derived hidden inputs. */
export const LOCATIONS_FIELD = "locations";

/** Hidden field carrying the active picker mode. */
export const LOCATION_MODE_FIELD = "location_mode";

export const BOSTON_CENTER = {
  latitude: 42.35,
  longitude: -71.1,
};

export const BOSTON_DEFAULT_ZOOM = 12;
