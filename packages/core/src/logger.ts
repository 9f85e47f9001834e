import pino from "pino";

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: "lens",
  level: (process.env.LENS_LOG_LEVEL || "info").trim() || "info",
  base: { service: "lens-core" },
});

/** Drops every line; tests pass it to components that take a logger. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
