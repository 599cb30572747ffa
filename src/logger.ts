import { pino, type Logger } from "pino";

const redactPaths = ["headers.authorization", "headers.Authorization"];

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  redact: {
    paths: redactPaths,
    censor: "[secure]",
  },
  base: undefined,
});

export type { Logger };
