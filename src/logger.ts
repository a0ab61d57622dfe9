import pino, { type Logger } from "pino";

// stdout carries the MCP stdio transport, so logs always go to stderr.
export const logger: Logger = pino(
  {
    name: "testrelay",
    level: process.env.LOG_LEVEL ?? (process.env.VITEST ? "silent" : "info")
  },
  pino.destination(2)
);

export type { Logger };
