import { configureLogger, isLogLevel, type LogLevel } from "./utils/logger.js";

export interface ModelConfig {
  /** Base directory relative local locators are resolved against. */
  cwd: string;
  logLevel: LogLevel;
  color: boolean;
  json: boolean;
}

export interface ResolveModelConfigOptions {
  cwd?: string;
  logLevel?: LogLevel;
  color?: boolean;
  json?: boolean;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/**
 * Resolves the model configuration.
 * Explicit options win over the environment, which wins over the defaults.
 */
export function resolveModelConfig(options: ResolveModelConfigOptions = {}): ModelConfig {
  const env = options.env ?? process.env;

  const envLevel = env.ZKGMETA_LOG_LEVEL;
  const logLevel = options.logLevel ?? (isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL);

  const color = options.color ?? !isNonEmptyString(env.NO_COLOR);
  const json = options.json ?? isTruthy(env.ZKGMETA_LOG_JSON);

  return {
    cwd: firstNonEmptyString([options.cwd, env.ZKGMETA_CWD]) ?? process.cwd(),
    logLevel,
    color,
    json,
  };
}

/** Pushes the logging part of a configuration into the shared logger. */
export function applyModelConfig(config: ModelConfig): void {
  configureLogger({
    level: config.logLevel,
    noColor: !config.color,
    json: config.json,
  });
}

function isNonEmptyString(value: string | undefined): value is string {
  return typeof value === "string" && value.length > 0;
}

function isTruthy(value: string | undefined): boolean {
  return isNonEmptyString(value) && TRUE_VALUES.has(value.toLowerCase());
}

function firstNonEmptyString(values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (isNonEmptyString(value)) {
      return value;
    }
  }

  return undefined;
}
