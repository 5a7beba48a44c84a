import pino, { type Logger } from "pino";

// Logs go to stderr: stdout is left for command output.
export function createLogger(verbose = false): Logger {
  return pino(
    {
      level: verbose ? "debug" : process.env.LOG_LEVEL ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}
