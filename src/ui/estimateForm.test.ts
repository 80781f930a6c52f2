// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";

import { EstimateRequestError } from "../lib/estimateClient";
import type { District } from "../types/location";
import { wireEstimateForm } from "./estimateForm";

const DISTRICTS: District[] = [
  { code: "allston", label: "Allston", coordinates: [42.353, -71.132] },
  { code: "fenway", label: "Fenway / Kenmore", coordinates: [42.347, -71.097] },
];

const setup = (inner: string) => {
  document.body.innerHTML = `<form id="search">${inner}</form><div id="estimate-results"></div>`;
  const form = document.getElementById("search");
  const results = document.getElementById("estimate-results");
  if (!(form instanceof HTMLFormElement) || !results) throw new Error("markup missing");
  return { form, results };
};

const rows = (results: HTMLElement) =>
  Array.from(results.querySelectorAll(".estimate-row")).map((row) => [
    row.querySelector(".estimate-row__label")?.textContent,
    row.querySelector(".estimate-row__value")?.textContent,
  ]);

describe("wireEstimateForm", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    document.body.innerHTML = "";
  });

  it("asks for a neighborhood when none is selected", async () => {
    const { form, results } = setup(`<input type="hidden" name="location_mode" value="map" />`);
    const estimate = vi.fn();
    const controller = wireEstimateForm(form, results, { districts: DISTRICTS, estimate });

    await controller.submit();

    expect(estimate).not.toHaveBeenCalled();
    expect(results.textContent).toBe("Pick at least one neighborhood to get an estimate.");
  });

  it("renders one row per selected location with the listing features", async () => {
    const { form, results } = setup(`
      <input type="hidden" name="location_mode" value="map" />
      <input type="hidden" name="locations" value="allston" />
      <input type="hidden" name="locations" value="fenway" />
      <input name="beds" value="2" />
      <input type="checkbox" name="amenity" value="Elevator" checked />
    `);
    const estimate = vi.fn(async ({ location }: { location: string }) => ({
      location,
      price: location === "allston" ? 2744.6 : 3300,
    }));
    const controller = wireEstimateForm(form, results, { districts: DISTRICTS, estimate });

    await controller.submit();

    expect(estimate).toHaveBeenCalledWith({ location: "allston", features: { beds: 2, Amenity_Elevator: 1 } });
    expect(rows(results)).toEqual([
      ["Allston", "$2,745/mo"],
      ["Fenway / Kenmore", "$3,300/mo"],
    ]);
  });

  it("shows the failure reason for a location without a model", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { form, results } = setup(`
      <input type="checkbox" name="locations" value="seaport" checked />
    `);
    const estimate = vi.fn(async () => {
      throw new EstimateRequestError('No rent model for location "seaport"', 404);
    });
    const controller = wireEstimateForm(form, results, { districts: DISTRICTS, estimate });

    await controller.submit();

    expect(rows(results)).toEqual([["seaport", 'No rent model for location "seaport"']]);
    expect(results.querySelector(".estimate-row--error")).not.toBeNull();
  });

  it("handles the form's submit event without navigating", async () => {
    const { form, results } = setup(`<input type="hidden" name="locations" value="fenway" />`);
    const estimate = vi.fn(async () => ({ location: "fenway", price: 3300 }));
    wireEstimateForm(form, results, { districts: DISTRICTS, estimate });

    const event = new Event("submit", { cancelable: true });
    form.dispatchEvent(event);

    expect(event.defaultPrevented).toBe(true);
    await vi.waitFor(() => {
      expect(rows(results)).toEqual([["Fenway / Kenmore", "$3,300/mo"]]);
    });
  });
});
