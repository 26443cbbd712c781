import pino from "pino";
import { env } from "../config/env";

const defaultLevel = (): string => {
  if (env.NODE_ENV === "production") {
    return "info";
  }

  return env.NODE_ENV === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "filing-index",
  level: env.LOG_LEVEL ?? defaultLevel(),
});

export type Logger = pino.Logger;

/**
 * Flattens thrown values into plain fields so pino serializes them the same way at every call site.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
