import pino, { type Logger } from "pino";
import { ulid } from "ulid";
import type { AppConfig } from "./config.js";

// Standard output carries converted data, so every log line goes to stderr
const STDERR = 2;

export function getLogger(config: Pick<AppConfig, "logLevel" | "logPretty">): Logger {
  const options = {
    level: config.logLevel,
    base: undefined, // do not inject pid and hostname automatically
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (config.logPretty) {
    return pino({
      ...options,
      transport: { target: "pino-pretty", options: { colorize: true, destination: STDERR } }
    });
  }
  return pino(options, pino.destination(STDERR));
}

/**
 * Child logger bound to one tool invocation
 */
export function runLogger(logger: Logger, tool: string): Logger {
  return logger.child({ tool, runId: ulid() });
}
