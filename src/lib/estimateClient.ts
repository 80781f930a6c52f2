export interface EstimateRequestInput {
  location: string;
  features: Record<string, number>;
}

export interface EstimateResult {
  location: string;
  price: number;
}

export class EstimateRequestError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "EstimateRequestError";
    this.status = status;
  }
}

export const ESTIMATE_ENDPOINT = "/api/estimate";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const readErrorMessage = (data: unknown): string | null => {
  if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
    return data.error;
  }
  return null;
};

export const requestEstimate = async (
  input: EstimateRequestInput,
  fetchImpl: FetchLike = fetch,
): Promise<EstimateResult> => {
  const response = await fetchImpl(ESTIMATE_ENDPOINT, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(input),
  });

  let data: unknown = null;
  try {
    data = await response.json();
  } catch {
    // Non-JSON bodies fall through to the status check
  }

  if (!response.ok) {
    throw new EstimateRequestError(readErrorMessage(data) ?? "Failed to compute estimate.", response.status);
  }

  if (
    typeof data !== "object" ||
    data === null ||
    !("price" in data) ||
    typeof data.price !== "number" ||
    !Number.isFinite(data.price)
  ) {
    throw new EstimateRequestError("Estimate response was malformed.", response.status);
  }

  return { location: input.location, price: data.price };
};
