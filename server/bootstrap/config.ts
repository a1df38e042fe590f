import { Ajv } from "ajv";
import schema from "../../config/schema.json" with { type: "json" };
import { ConfigError } from "../domain/errors.js";

export type NodeEnv = "local" | "dev" | "test" | "prod";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
  logPretty: boolean;
  maxInputBytes: number;
}

export const DEFAULT_MAX_INPUT_BYTES = 64 * 1024 * 1024;

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<AppConfig>(schema);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfg = {
    nodeEnv: env.NODE_ENV || "local",
    logLevel: env.LOG_LEVEL || "info",
    logPretty: env.LOG_PRETTY === "true",
    maxInputBytes: env.MAX_INPUT_BYTES ? Number(env.MAX_INPUT_BYTES) : DEFAULT_MAX_INPUT_BYTES
  };

  if (!validate(cfg)) {
    const msgs = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`);
    throw new ConfigError(msgs);
  }
  return cfg;
}
