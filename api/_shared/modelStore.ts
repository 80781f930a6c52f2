import fs from "node:fs/promises";
import path from "node:path";

import {
  ModelBundleError,
  parseModelBundle,
  type ModelBundle,
  type ModelBundleLoader,
} from "../../src/lib/priceEstimate";

const LOCATION_PATTERN = /^[a-z0-9_]+$/;

export const resolveModelsDir = (): string => {
  const configured = process.env.BURE_MODELS_DIR?.trim();
  return configured ? path.resolve(configured) : path.resolve(process.cwd(), "models");
};

export const isValidLocationCode = (location: string): boolean => LOCATION_PATTERN.test(location);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Loads `<dir>/<location>.json` bundles on demand and keeps them for the life
 * of the process. Codes outside `[a-z0-9_]` never touch the filesystem.
 */
export const createFileModelLoader = (dir: string = resolveModelsDir()): ModelBundleLoader => {
  const cache = new Map<string, ModelBundle>();

  return async (location) => {
    if (!isValidLocationCode(location)) return null;
    const cached = cache.get(location);
    if (cached) return cached;

    const file = path.join(dir, `${location}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ModelBundleError(`Model bundle ${file} is not valid JSON`);
    }

    const bundle = parseModelBundle(parsed, location);
    cache.set(location, bundle);
    return bundle;
  };
};
