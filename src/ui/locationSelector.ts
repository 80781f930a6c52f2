import { BOSTON_DISTRICTS } from "../data/districts";
import { resolveMapConfig, type MapConfig } from "../lib/config";
import { createLogger } from "../lib/logger";
import {
  isLocationMode,
  LOCATIONS_FIELD,
  type District,
  type LocationCode,
  type LocationMode,
} from "../types/location";
import { createMapLibreSurface, type MapSurface, type MapSurfaceFactory, type MarkerHandle } from "./mapSurface";
import { DEFAULT_MARKER_STYLE, styleFor } from "./markerStyles";
import { computeClearSelection, computeToggle, toFieldValues } from "./state/locationSelection";

const logger = createLogger("location-selector");

export interface LocationSelectorElements {
  modeButtons: HTMLElement[];
  modeInput: HTMLInputElement;
  listPanel: HTMLElement;
  mapPanel: HTMLElement;
  mapContainer: HTMLElement | null;
  /** Owned by the selector; its children are rewritten on every sync. */
  hiddenInputs: HTMLElement | null;
}

export interface LocationSelectorSelectors {
  modeButtons: string;
  modeInput: string;
  listPanel: string;
  mapPanel: string;
  mapContainer: string;
  hiddenInputs: string;
}

export const DEFAULT_SELECTORS: LocationSelectorSelectors = {
  modeButtons: ".location-mode-toggle .mode-btn",
  modeInput: "#location_mode",
  listPanel: "#location-list-mode",
  mapPanel: "#location-map-mode",
  mapContainer: "#location-map",
  hiddenInputs: "#map-location-inputs",
};

export interface LocationSelectorOptions {
  districts?: District[];
  mapConfig?: MapConfig;
  createSurface?: MapSurfaceFactory;
  /** Defers the post-visibility resize; defaults to setTimeout. */
  schedule?: (callback: () => void, delayMs: number) => void;
  onModeChange?: (mode: LocationMode) => void;
  onSelectionChange?: (codes: LocationCode[]) => void;
}

export interface LocationSelectorController {
  getMode: () => LocationMode;
  getSelection: () => LocationCode[];
  isMapReady: () => boolean;
  setMode: (mode: LocationMode) => void;
  toggleLocation: (code: LocationCode) => void;
  syncHiddenInputs: () => void;
  destroy: () => void;
}

const asHTMLElement = (node: Element | null): HTMLElement | null =>
  node instanceof HTMLElement ? node : null;

/**
 * Looks up the picker markup. Returns null when any required anchor is
 * missing, in which case the page simply has no picker to wire.
 */
export const resolveLocationSelectorElements = (
  root: ParentNode,
  selectors: LocationSelectorSelectors = DEFAULT_SELECTORS,
): LocationSelectorElements | null => {
  const modeButtons = Array.from(root.querySelectorAll(selectors.modeButtons)).filter(
    (node): node is HTMLElement => node instanceof HTMLElement,
  );
  const modeInput = root.querySelector(selectors.modeInput);
  const listPanel = asHTMLElement(root.querySelector(selectors.listPanel));
  const mapPanel = asHTMLElement(root.querySelector(selectors.mapPanel));

  if (modeButtons.length === 0 || !(modeInput instanceof HTMLInputElement) || !listPanel || !mapPanel) {
    return null;
  }

  return {
    modeButtons,
    modeInput,
    listPanel,
    mapPanel,
    mapContainer: asHTMLElement(root.querySelector(selectors.mapContainer)),
    hiddenInputs: asHTMLElement(root.querySelector(selectors.hiddenInputs)),
  };
};

export const createLocationSelector = (
  elements: LocationSelectorElements,
  options: LocationSelectorOptions = {},
): LocationSelectorController => {
  const {
    districts = BOSTON_DISTRICTS,
    mapConfig = resolveMapConfig(),
    createSurface = createMapLibreSurface,
    schedule = (callback, delayMs) => {
      setTimeout(callback, delayMs);
    },
    onModeChange,
    onSelectionChange,
  } = options;
  const { modeButtons, modeInput, listPanel, mapPanel, mapContainer, hiddenInputs } = elements;

  let mode: LocationMode = isLocationMode(modeInput.value) ? modeInput.value : "list";
  let selection = computeClearSelection();
  let surface: MapSurface | null = null;
  let destroyed = false;
  const markers = new Map<LocationCode, MarkerHandle>();

  const syncHiddenInputs = () => {
    if (!hiddenInputs) return;
    const doc = hiddenInputs.ownerDocument;
    const inputs = toFieldValues(selection).map((code) => {
      const input = doc.createElement("input");
      input.type = "hidden";
      input.name = LOCATIONS_FIELD;
      input.value = code;
      return input;
    });
    hiddenInputs.replaceChildren(...inputs);
  };

  const emitSelection = () => {
    onSelectionChange?.(toFieldValues(selection));
  };

  const toggleLocation = (code: LocationCode) => {
    if (destroyed) return;
    const marker = markers.get(code);
    if (!marker) {
      logger.warn(`Ignoring toggle for unknown location "${code}"`);
      return;
    }
    if (mode !== "map") {
      logger.warn(`Ignoring toggle for "${code}" outside map mode`);
      return;
    }

    const result = computeToggle(code, selection);
    selection = result.selection;
    marker.setStyle(styleFor(result.selected));
    syncHiddenInputs();
    emitSelection();
  };

  const ensureMap = () => {
    if (surface || !mapContainer) return;

    let created: MapSurface | null;
    try {
      created = createSurface(mapContainer, {
        center: mapConfig.center,
        zoom: mapConfig.zoom,
        maxZoom: mapConfig.maxZoom,
      });
    } catch (error) {
      logger.error("Map failed to initialize; map mode is inactive", error);
      return;
    }
    if (!created) {
      logger.warn("Mapping library unavailable; map mode is inactive");
      return;
    }

    surface = created;
    surface.addTileLayer({
      url: mapConfig.tileUrl,
      attribution: mapConfig.tileAttribution,
      maxZoom: mapConfig.maxZoom,
    });

    for (const district of districts) {
      if (markers.has(district.code)) {
        logger.warn(`Duplicate location code "${district.code}" skipped`);
        continue;
      }
      const marker = surface.addCircleMarker(
        district.coordinates,
        styleFor(selection.has(district.code)),
        district.label,
      );
      marker.onClick(() => toggleLocation(district.code));
      markers.set(district.code, marker);
    }
    logger.debug(`Map ready with ${markers.size} locations`);
  };

  const uncheckListCheckboxes = () => {
    const checkboxes = listPanel.querySelectorAll(`input[name="${LOCATIONS_FIELD}"]`);
    checkboxes.forEach((node) => {
      if (node instanceof HTMLInputElement) node.checked = false;
    });
  };

  const applyPanels = () => {
    listPanel.style.display = mode === "list" ? "block" : "none";
    mapPanel.style.display = mode === "map" ? "block" : "none";
    for (const button of modeButtons) {
      const active = button.dataset.mode === mode;
      button.classList.toggle("active", active);
      button.setAttribute("aria-pressed", `${active}`);
    }
  };

  const scheduleRefresh = () => {
    // The panel was display:none until now; let layout settle before measuring.
    schedule(() => {
      surface?.resize();
    }, mapConfig.refreshDelayMs);
  };

  const setMode = (next: LocationMode) => {
    if (destroyed) return;
    const changed = next !== mode;
    mode = next;
    modeInput.value = next;
    applyPanels();
    uncheckListCheckboxes();

    if (next === "list") {
      const hadSelection = selection.size > 0;
      selection = computeClearSelection();
      hiddenInputs?.replaceChildren();
      markers.forEach((marker) => marker.setStyle(DEFAULT_MARKER_STYLE));
      if (hadSelection) emitSelection();
    } else {
      ensureMap();
      scheduleRefresh();
    }

    if (changed) onModeChange?.(next);
  };

  const handleModeClick = (event: Event) => {
    const target = event.currentTarget;
    if (!(target instanceof HTMLElement)) return;
    const requested = target.dataset.mode;
    if (!isLocationMode(requested)) {
      logger.warn(`Mode button carries unknown mode "${requested ?? ""}"`);
      return;
    }
    setMode(requested);
  };

  for (const button of modeButtons) {
    button.addEventListener("click", handleModeClick);
  }

  // Mount reflects the current mode without treating it as a user switch:
  // list checkboxes keep whatever the page rendered.
  modeInput.value = mode;
  applyPanels();
  syncHiddenInputs();
  if (mode === "map") {
    ensureMap();
    scheduleRefresh();
  }

  const destroy = () => {
    if (destroyed) return;
    destroyed = true;
    for (const button of modeButtons) {
      button.removeEventListener("click", handleModeClick);
    }
    selection = computeClearSelection();
    hiddenInputs?.replaceChildren();
    surface?.destroy();
    surface = null;
    markers.clear();
  };

  return {
    getMode: () => mode,
    getSelection: () => toFieldValues(selection),
    isMapReady: () => surface !== null,
    setMode,
    toggleLocation,
    syncHiddenInputs,
    destroy,
  };
};

/**
 * Wires the picker if the page has its markup; otherwise returns null and
 * leaves the page untouched.
 */
export const mountLocationSelector = (
  root: ParentNode,
  options: LocationSelectorOptions & { selectors?: LocationSelectorSelectors } = {},
): LocationSelectorController | null => {
  const { selectors, ...rest } = options;
  const elements = resolveLocationSelectorElements(root, selectors);
  if (!elements) {
    logger.debug("Location picker markup not found; skipping");
    return null;
  }
  return createLocationSelector(elements, rest);
};
