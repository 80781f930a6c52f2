import type { MarkerStyle } from "../types/location";

export const DEFAULT_MARKER_STYLE: MarkerStyle = {
  radius: 11,
  strokeColor: "#1e3a8a", // blue-900
  strokeWeight: 1,
  fillColor: "#3b82f6", // blue-500
  fillOpacity: 0.6,
};

export const SELECTED_MARKER_STYLE: MarkerStyle = {
  ...DEFAULT_MARKER_STYLE,
  radius: 13,
  strokeColor: "#b91c1c", // red-700
  strokeWeight: 3,
  fillColor: "#f87171", // red-400
};

export const styleFor = (selected: boolean): MarkerStyle =>
  selected ? SELECTED_MARKER_STYLE : DEFAULT_MARKER_STYLE;

/** Converts `#rgb` / `#rrggbb` to an `rgba()` string; other colors pass through unchanged. */
export const toRgba = (color: string, alpha: number): string => {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(color.trim());
  if (!match) return color;
  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split("")
      .map((c) => c + c)
      .join("");
  }
  const r = parseInt(hex.slice(0, 2), 16);
  const g = parseInt(hex.slice(2, 4), 16);
  const b = parseInt(hex.slice(4, 6), 16);
  const a = Math.min(Math.max(alpha, 0), 1);
  return `rgba(${r}, ${g}, ${b}, ${a})`;
};

/**
 * Paints a circular marker element. The stroke sits outside the fill so the
 * rendered diameter is `2 * (radius + strokeWeight)`, matching circle markers
 * drawn on a canvas.
 */
export const applyMarkerStyle = (element: HTMLElement, style: MarkerStyle): void => {
  const diameter = style.radius * 2;
  element.style.boxSizing = "content-box";
  element.style.width = `${diameter}px`;
  element.style.height = `${diameter}px`;
  element.style.borderRadius = "50%";
  element.style.borderStyle = "solid";
  element.style.borderWidth = `${style.strokeWeight}px`;
  element.style.borderColor = style.strokeColor;
  element.style.backgroundColor = toRgba(style.fillColor, style.fillOpacity);
};
