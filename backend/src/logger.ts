import pino from "pino";
import pretty from "pino-pretty";
import { env } from "./config/env";

function createLogger(): pino.Logger {
  const usePretty = env.LOG_PRETTY || env.NODE_ENV === "development";
  const options: pino.LoggerOptions = {
    level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime
  };
  if (usePretty) {
    return pino(options, pretty({ colorize: true, translateTime: "SYS:standard", destination: 1 }));
  }
  return pino(options);
}

export const logger = createLogger();

/** Create a child logger with bound context (e.g. component, submissionId). */
export function child(bindings: Record<string, string | undefined>): pino.Logger {
  return logger.child(bindings);
}
