import { isDevEnv } from "./env";

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  /** Logs and records the failure on `window.__errorLog`. */
  error: (message: string, error?: unknown) => void;
}

export interface LoggedError {
  at: string;
  scope: string;
  message: string;
  cause?: string;
  stack?: string;
}

declare global {
  interface Window {
    __errorLog?: LoggedError[];
  }
}

const MAX_LOGGED_ERRORS = 20;

const describeCause = (error: unknown): string | undefined => {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
};

// Oldest entries fall off once the buffer is full.
const recordError = (entry: LoggedError) => {
  if (typeof window === "undefined") return;
  const log = window.__errorLog ?? [];
  log.push(entry);
  window.__errorLog = log.slice(-MAX_LOGGED_ERRORS);
};

export const createLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (!isDevEnv()) return;
      console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      console.warn(prefix, message, ...details);
    },
    error: (message, error) => {
      const cause = describeCause(error);
      console.error(prefix, message, cause ?? "");
      recordError({
        at: new Date().toISOString(),
        scope,
        message,
        cause,
        stack: error instanceof Error ? error.stack : undefined,
      });
    },
  };
};
