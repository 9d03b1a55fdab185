import pino, { type LoggerOptions } from "pino";

// ── Structured Logger: pino ─────────────────────────────
// Pretty output in development, JSON when NODE_ENV=production.
// LOG_PRETTY=true / false overrides either way. Logs go to stderr so
// they never interleave with the assistant's replies on stdout.

const isProduction = process.env.NODE_ENV === "production";
const prettySetting = process.env.LOG_PRETTY;
const isPretty =
  prettySetting === "true" || (!isProduction && prettySetting !== "false");

const base: LoggerOptions = {
  name: "shell-recall",
  level: process.env.LOG_LEVEL || "info",
};

export const log = isPretty
  ? pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname,name",
          destination: 2,
        },
      },
    })
  : pino(base, pino.destination(2));

export type Logger = typeof log;
