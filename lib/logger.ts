import pino from "pino";

/**
 * The library's root logger. JSON lines to stdout at LOG_LEVEL (default "info"),
 * and silenced when running under the test runner.
 */
export const logger = pino({
  name: "esnl",
  level:
    process.env.LOG_LEVEL ||
    (process.env.NODE_ENV === "test" ? "silent" : "info"),
});

export type Logger = typeof logger;
