import { BOSTON_CENTER, BOSTON_DEFAULT_ZOOM } from "../types/location";
import { getEnvNumber, getEnvString } from "./env";

export interface MapConfig {
  tileUrl: string;
  tileAttribution: string;
  maxZoom: number;
  center: { latitude: number; longitude: number };
  zoom: number;
  /** Delay before recomputing map size after the map panel becomes visible. */
  refreshDelayMs: number;
}

export const OSM_TILE_URL = "https://tile.openstreetmap.org/{z}/{x}/{y}.png";
export const OSM_ATTRIBUTION = "&copy; OpenStreetMap contributors";
export const DEFAULT_REFRESH_DELAY_MS = 150;

export const resolveMapConfig = (): MapConfig => {
  const refreshDelay = getEnvNumber("VITE_MAP_REFRESH_DELAY_MS");
  return {
    tileUrl: getEnvString("VITE_MAP_TILE_URL") ?? OSM_TILE_URL,
    tileAttribution: getEnvString("VITE_MAP_TILE_ATTRIBUTION") ?? OSM_ATTRIBUTION,
    maxZoom: getEnvNumber("VITE_MAP_MAX_ZOOM") ?? 19,
    center: {
      latitude: getEnvNumber("VITE_MAP_CENTER_LAT") ?? BOSTON_CENTER.latitude,
      longitude: getEnvNumber("VITE_MAP_CENTER_LNG") ?? BOSTON_CENTER.longitude,
    },
    zoom: getEnvNumber("VITE_MAP_ZOOM") ?? BOSTON_DEFAULT_ZOOM,
    refreshDelayMs:
      refreshDelay !== undefined && refreshDelay >= 0 ? refreshDelay : DEFAULT_REFRESH_DELAY_MS,
  };
};
