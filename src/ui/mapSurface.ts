import maplibregl from "maplibre-gl";

import type { MarkerStyle } from "../types/location";
import { applyMarkerStyle } from "./markerStyles";

export interface MarkerHandle {
  setStyle: (style: MarkerStyle) => void;
  onClick: (handler: () => void) => void;
}

export interface TileLayerOptions {
  url: string;
  attribution: string;
  maxZoom: number;
}

export interface MapSurfaceOptions {
  center: { latitude: number; longitude: number };
  zoom: number;
  maxZoom: number;
}

/**
 * The slice of the mapping library the location picker relies on. Anything
 * that can draw tiles and clickable circles behind this interface works.
 */
export interface MapSurface {
  addTileLayer: (options: TileLayerOptions) => void;
  /** `coordinates` are `[latitude, longitude]`. */
  addCircleMarker: (coordinates: [number, number], style: MarkerStyle, label?: string) => MarkerHandle;
  /** Recomputes the canvas size from the container's current layout. */
  resize: () => void;
  destroy: () => void;
}

/** Returns null when the mapping library cannot render in this environment. */
export type MapSurfaceFactory = (container: HTMLElement, options: MapSurfaceOptions) => MapSurface | null;

const TILE_SOURCE_ID = "base-tiles";
const TILE_LAYER_ID = "base-tiles";

export const createMapLibreSurface: MapSurfaceFactory = (container, options) => {
  if (typeof maplibregl.Map !== "function") return null;

  const map = new maplibregl.Map({
    container,
    // Tiles are attached through addTileLayer
    style: { version: 8, sources: {}, layers: [] },
    center: [options.center.longitude, options.center.latitude],
    zoom: options.zoom,
    maxZoom: options.maxZoom,
    attributionControl: false,
  });

  map.dragRotate.disable();
  map.touchZoomRotate.disableRotation();

  map.addControl(new maplibregl.AttributionControl({ compact: true }), "bottom-right");
  map.addControl(new maplibregl.NavigationControl({ showCompass: false }), "top-right");

  const markers: maplibregl.Marker[] = [];

  const addTileLayer = ({ url, attribution, maxZoom }: TileLayerOptions) => {
    const attach = () => {
      if (map.getSource(TILE_SOURCE_ID)) return;
      map.addSource(TILE_SOURCE_ID, {
        type: "raster",
        tiles: [url],
        tileSize: 256,
        maxzoom: maxZoom,
        attribution,
      });
      map.addLayer({ id: TILE_LAYER_ID, type: "raster", source: TILE_SOURCE_ID });
    };

    if (map.isStyleLoaded()) {
      attach();
    } else {
      map.once("load", attach);
    }
  };

  const addCircleMarker = (
    coordinates: [number, number],
    style: MarkerStyle,
    label?: string,
  ): MarkerHandle => {
    const [latitude, longitude] = coordinates;
    const element = document.createElement("div");
    element.className = "location-marker";
    element.style.cursor = "pointer";
    element.setAttribute("role", "button");
    if (label) {
      element.title = label;
      element.setAttribute("aria-label", label);
    }
    applyMarkerStyle(element, style);

    const marker = new maplibregl.Marker({ element }).setLngLat([longitude, latitude]).addTo(map);
    markers.push(marker);

    return {
      setStyle: (next) => applyMarkerStyle(element, next),
      onClick: (handler) => {
        element.addEventListener("click", (event) => {
          // Keep the click from reaching the map canvas underneath
          event.stopPropagation();
          handler();
        });
      },
    };
  };

  const destroy = () => {
    for (const marker of markers) marker.remove();
    markers.length = 0;
    map.remove();
  };

  return {
    addTileLayer,
    addCircleMarker,
    resize: () => map.resize(),
    destroy,
  };
};
