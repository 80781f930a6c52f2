/**
 * Rent estimates from per-district linear models.
 *
 * A model bundle stores the ordered feature names the model was fitted on,
 * one coefficient per feature, and an intercept. Features missing from the
 * input count as 0, so a bare `{ beds: 2 }` still produces an estimate.
 */

export interface ModelBundle {
  location: string;
  features: string[];
  coefficients: number[];
  intercept: number;
}

export type FeatureInput = Record<string, unknown>;

/** Resolves the bundle for a location, or null when none was trained. */
export type ModelBundleLoader = (location: string) => Promise<ModelBundle | null>;

/** Location code the search form sends when nothing usable was picked. */
export const INVALID_LOCATION = "invalid";

export class ModelBundleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelBundleError";
  }
}

export class FeatureValueError extends Error {
  readonly feature: string;

  constructor(feature: string, value: unknown) {
    super(`Feature "${feature}" must be numeric (got ${JSON.stringify(value) ?? String(value)})`);
    this.name = "FeatureValueError";
    this.feature = feature;
  }
}

export class ModelNotFoundError extends Error {
  readonly location: string;

  constructor(location: string) {
    super(`No rent model for location "${location}"`);
    this.name = "ModelNotFoundError";
    this.location = location;
  }
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const parseModelBundle = (raw: unknown, location: string): ModelBundle => {
  if (!isRecord(raw)) {
    throw new ModelBundleError(`Model bundle for "${location}" is not an object`);
  }
  const { features, coefficients, intercept } = raw;
  if (!Array.isArray(features) || !features.every((f): f is string => typeof f === "string" && f.length > 0)) {
    throw new ModelBundleError(`Model bundle for "${location}" has invalid feature names`);
  }
  if (!Array.isArray(coefficients) || !coefficients.every(isFiniteNumber)) {
    throw new ModelBundleError(`Model bundle for "${location}" has non-numeric coefficients`);
  }
  if (features.length !== coefficients.length) {
    throw new ModelBundleError(
      `Model bundle for "${location}" has ${features.length} features but ${coefficients.length} coefficients`,
    );
  }
  if (new Set(features).size !== features.length) {
    throw new ModelBundleError(`Model bundle for "${location}" repeats a feature name`);
  }
  if (!isFiniteNumber(intercept)) {
    throw new ModelBundleError(`Model bundle for "${location}" has no numeric intercept`);
  }
  return { location, features: [...features], coefficients: [...coefficients], intercept };
};

const toFeatureValue = (name: string, value: unknown): number => {
  if (value === undefined || value === null) return 0;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (isFiniteNumber(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new FeatureValueError(name, value);
};

/** Lays the input out in model order. Unknown input keys are ignored. */
export const buildFeatureVector = (features: string[], input: FeatureInput): number[] =>
  features.map((name) => toFeatureValue(name, Object.hasOwn(input, name) ? input[name] : undefined));

export const evaluateModel = (bundle: ModelBundle, vector: number[]): number => {
  if (vector.length !== bundle.coefficients.length) {
    throw new ModelBundleError(
      `Expected ${bundle.coefficients.length} feature values for "${bundle.location}", got ${vector.length}`,
    );
  }
  let total = bundle.intercept;
  for (let i = 0; i < vector.length; i++) {
    total += bundle.coefficients[i] * vector[i];
  }
  return total;
};

export const predictPrice = async (
  input: FeatureInput,
  location: string,
  loadBundle: ModelBundleLoader,
): Promise<number> => {
  if (location === INVALID_LOCATION) return 0;

  const bundle = await loadBundle(location);
  if (!bundle) throw new ModelNotFoundError(location);

  return evaluateModel(bundle, buildFeatureVector(bundle.features, input));
};

export const roundToCents = (value: number): number => Math.round(value * 100) / 100;
