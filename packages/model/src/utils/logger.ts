/**
 * Logger for the package model.
 *
 * Silent below "warn" unless configured otherwise, so parsing metadata never
 * prints anything in the default setup.
 */
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Lowest level that is written. */
  level?: LogLevel;
  /** Only write errors. */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** Write one JSON object per line */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_OPTIONS: Readonly<LoggerOptions> = {
  level: "warn",
  quiet: false,
  noColor: false,
  json: false,
};

let globalOptions: LoggerOptions = { ...DEFAULT_OPTIONS };

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function shouldOutput(level: LogLevel): boolean {
  if (globalOptions.quiet) {
    return level === "error";
  }

  const threshold = globalOptions.level ?? "warn";
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatTextMessage(level: LogLevel, message: string): string {
  if (globalOptions.noColor) {
    switch (level) {
      case "debug":
        return `[debug] ${message}`;
      case "info":
        return message;
      case "warn":
        return `warning: ${message}`;
      case "error":
        return `error: ${message}`;
    }
  }

  switch (level) {
    case "debug":
      return chalk.gray(`[debug] ${message}`);
    case "info":
      return message;
    case "warn":
      return chalk.yellow(`${chalk.bold("warning:")} ${message}`);
    case "error":
      return chalk.red(`${chalk.bold("error:")} ${message}`);
  }
}

function formatData(data: Record<string, unknown>): string {
  const text = JSON.stringify(data);
  return globalOptions.noColor ? text : chalk.gray(text);
}

function outputLog(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (globalOptions.json) {
    const entry: JsonLogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (data) {
      entry.data = data;
    }
    process.stderr.write(JSON.stringify(entry) + "\n");
    return;
  }

  let line = formatTextMessage(level, message);
  if (data) {
    line += ` ${formatData(data)}`;
  }

  process.stderr.write(line + "\n");
}

function createLoggerInstance(): Logger {
  return {
    debug(message: string, data?: Record<string, unknown>): void {
      outputLog("debug", message, data);
    },

    info(message: string, data?: Record<string, unknown>): void {
      outputLog("info", message, data);
    },

    warn(message: string, data?: Record<string, unknown>): void {
      outputLog("warn", message, data);
    },

    error(message: string, data?: Record<string, unknown>): void {
      outputLog("error", message, data);
    },

    configure(options: LoggerOptions): void {
      globalOptions = { ...globalOptions, ...options };
    },

    getOptions(): Readonly<LoggerOptions> {
      return { ...globalOptions };
    },
  };
}

export const logger = createLoggerInstance();

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}

export function resetLogger(): void {
  globalOptions = { ...DEFAULT_OPTIONS };
}
