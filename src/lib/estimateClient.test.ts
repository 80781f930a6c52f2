import { describe, it, expect, vi } from "vitest";

import { EstimateRequestError, requestEstimate } from "./estimateClient";

const jsonResponse = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("requestEstimate", () => {
  it("posts the input as JSON and returns the price", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse(200, { location: "fenway", price: 3300 }));

    const result = await requestEstimate({ location: "fenway", features: { beds: 2 } }, fetchImpl);

    expect(result).toEqual({ location: "fenway", price: 3300 });
    expect(fetchImpl).toHaveBeenCalledWith("/api/estimate", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ location: "fenway", features: { beds: 2 } }),
    });
  });

  it("surfaces the server's error message and status", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse(404, { error: 'No rent model for location "seaport"' }));

    const error = await requestEstimate({ location: "seaport", features: {} }, fetchImpl).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EstimateRequestError);
    expect(error).toMatchObject({ message: 'No rent model for location "seaport"', status: 404 });
  });

  it("uses a generic message when the body is not JSON", async () => {
    const fetchImpl = vi.fn(async () => new Response("gateway down", { status: 502 }));

    await expect(requestEstimate({ location: "fenway", features: {} }, fetchImpl)).rejects.toThrow(
      "Failed to compute estimate.",
    );
  });

  it("rejects responses without a numeric price", async () => {
    const fetchImpl = vi.fn(async () => jsonResponse(200, { price: "lots" }));

    await expect(requestEstimate({ location: "fenway", features: {} }, fetchImpl)).rejects.toThrow(
      "Estimate response was malformed.",
    );
  });
});
