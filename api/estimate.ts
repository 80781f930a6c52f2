import { createLogger } from "../src/lib/logger";
import {
  FeatureValueError,
  ModelBundleError,
  ModelNotFoundError,
  predictPrice,
  roundToCents,
  type ModelBundleLoader,
} from "../src/lib/priceEstimate";
import { createFileModelLoader, isValidLocationCode } from "./_shared/modelStore";

type EstimateRequest = {
  method?: string;
  body?: unknown;
  headers?: Record<string, string | string[] | undefined>;
  on?: (event: "data" | "end" | "error", listener: (...args: unknown[]) => void) => void;
};

type EstimateResponse = {
  status: (code: number) => EstimateResponse;
  json: (payload: unknown) => void;
  setHeader: (name: string, value: string) => void;
};

type EstimateBody = {
  location?: unknown;
  features?: unknown;
};

type EstimateHandlerDeps = {
  loadBundle?: ModelBundleLoader;
};

const logger = createLogger("estimate");

const normalizeString = (value: unknown): string | null => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseBody = async (req: EstimateRequest): Promise<EstimateBody> => {
  if (typeof req.body === "string") {
    const parsed: unknown = JSON.parse(req.body);
    return isRecord(parsed) ? parsed : {};
  }
  if (isRecord(req.body)) {
    return req.body;
  }
  if (typeof req.on !== "function") {
    return {};
  }
  const data = await new Promise<string>((resolve, reject) => {
    let buffer = "";
    const decoder = new TextDecoder();
    req.on?.("data", (chunk: unknown) => {
      if (typeof chunk === "string") {
        buffer += chunk;
        return;
      }
      if (chunk instanceof Uint8Array) {
        buffer += decoder.decode(chunk);
        return;
      }
      buffer += String(chunk);
    });
    req.on?.("end", () => resolve(buffer));
    req.on?.("error", (error: unknown) => reject(error));
  });
  if (!data) return {};
  const parsed: unknown = JSON.parse(data);
  return isRecord(parsed) ? parsed : {};
};

const respond = (res: EstimateResponse, statusCode: number, payload: unknown): void => {
  res.setHeader("Content-Type", "application/json");
  res.status(statusCode).json(payload);
};

export const createEstimateHandler = (deps: EstimateHandlerDeps = {}) => {
  const loadBundle = deps.loadBundle ?? createFileModelLoader();

  return async function handler(req: EstimateRequest, res: EstimateResponse) {
    if (req.method !== "POST") {
      respond(res, 405, { error: "Method not allowed" });
      return;
    }

    let body: EstimateBody;
    try {
      body = await parseBody(req);
    } catch {
      respond(res, 400, { error: "Invalid JSON body." });
      return;
    }

    const location = normalizeString(body.location)?.toLowerCase() ?? null;
    if (!location || (location !== "invalid" && !isValidLocationCode(location))) {
      respond(res, 400, { error: "A location code is required." });
      return;
    }

    const features = body.features ?? {};
    if (!isRecord(features)) {
      respond(res, 400, { error: "'features' must be an object of feature values." });
      return;
    }

    try {
      const price = await predictPrice(features, location, loadBundle);
      respond(res, 200, { location, price: roundToCents(price) });
    } catch (error) {
      if (error instanceof FeatureValueError) {
        respond(res, 400, { error: error.message, feature: error.feature });
        return;
      }
      if (error instanceof ModelNotFoundError) {
        respond(res, 404, { error: error.message });
        return;
      }
      if (error instanceof ModelBundleError) {
        logger.error(`Broken model bundle for "${location}"`, error);
      } else {
        logger.error("Estimate failed", error);
      }
      respond(res, 500, { error: "Failed to compute estimate." });
    }
  };
};

const handler = createEstimateHandler();

export default handler;
