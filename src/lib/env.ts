type EnvRecord = Record<string, unknown>;

const coerceBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const lowered = value.toLowerCase().trim();
    if (["true", "1", "yes", "y"].includes(lowered)) return true;
    if (["false", "0", "no", "n"].includes(lowered)) return false;
  }
  return undefined;
};

const coerceNumber = (value: unknown): number | undefined => {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const getImportMetaEnv = (): EnvRecord => {
  try {
    const env: EnvRecord | undefined = import.meta.env;
    return env ? { ...env } : {};
  } catch {
    return {};
  }
};

const getProcessEnv = (): EnvRecord => {
  if (typeof process === "undefined" || typeof process.env !== "object") {
    return {};
  }
  return process.env;
};

export const getEnv = (): EnvRecord => {
  return { ...getProcessEnv(), ...getImportMetaEnv() };
};

export const getEnvString = (key: string): string | undefined => {
  const value = getEnv()[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
};

export const getEnvBoolean = (key: string): boolean | undefined => {
  const value = getEnv()[key];
  return coerceBoolean(value);
};

export const getEnvNumber = (key: string): number | undefined => {
  const value = getEnv()[key];
  return coerceNumber(value);
};

export const isDevEnv = (): boolean => {
  const rawDev = getEnvBoolean("DEV");
  if (rawDev !== undefined) return rawDev;

  const mode = getEnvString("MODE") ?? getEnvString("NODE_ENV");
  if (mode) return mode !== "production";

  return true;
};
