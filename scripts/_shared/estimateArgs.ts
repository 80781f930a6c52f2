import minimist from "minimist";

import { AMENITY_FEATURE_PREFIX } from "../../src/ui/locationForm";

export interface EstimateArgs {
  location: string;
  features: Record<string, number>;
  modelsDir?: string;
  json: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE =
  "Usage: tsx scripts/estimate.ts --location <code> [--beds N] [--baths N] [--sqft N] [--amenity Name ...] [--models DIR] [--json]";

const NUMERIC_FLAGS = ["beds", "baths", "sqft"] as const;

const toList = (value: unknown): string[] => {
  if (Array.isArray(value)) return value.flatMap(toList);
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return [];
};

export const parseEstimateArgs = (argv: string[]): EstimateArgs => {
  const args = minimist(argv, {
    string: ["location", "amenity", "models", ...NUMERIC_FLAGS],
    boolean: ["json"],
    alias: { l: "location", a: "amenity", m: "models" },
  });

  const location = typeof args.location === "string" ? args.location.trim().toLowerCase() : "";
  if (!location) {
    throw new UsageError("--location is required");
  }

  const features: Record<string, number> = {};
  for (const flag of NUMERIC_FLAGS) {
    const raw: unknown = args[flag];
    if (raw === undefined || raw === "") continue;
    const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : NaN;
    if (!Number.isFinite(value)) {
      throw new UsageError(`--${flag} must be a number`);
    }
    features[flag] = value;
  }

  for (const amenity of toList(args.amenity)) {
    const name = amenity.startsWith(AMENITY_FEATURE_PREFIX) ? amenity : `${AMENITY_FEATURE_PREFIX}${amenity}`;
    features[name] = 1;
  }

  const modelsDir = typeof args.models === "string" && args.models.trim() ? args.models.trim() : undefined;

  return { location, features, modelsDir, json: args.json === true };
};
