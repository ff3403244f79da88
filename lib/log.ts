// lib/log.ts - Environment-based logging for the ATS pipeline

const DEBUG = process.env.NODE_ENV === "development";

/** Logs only in development. */
export const debug = (...args: unknown[]): void => {
  if (DEBUG) {
    console.log(...args);
  }
};

export const logError = (...args: unknown[]): void => {
  console.error(...args);
};

export const logWarning = (...args: unknown[]): void => {
  console.warn(...args);
};

/** Capability notes and other info; development only. */
export const logInfo = (...args: unknown[]): void => {
  if (DEBUG) {
    console.info(...args);
  }
};
