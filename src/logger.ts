import chalk from "chalk";

type Level = "silent" | "error" | "warn" | "info" | "debug";

const levels: Record<Level, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLevel(value: string): value is Level {
  return Object.hasOwn(levels, value);
}

// Read on every call so tests and hosts can flip LOG_LEVEL at runtime
function currentLevel(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLevel(raw) ? levels[raw] : levels.info;
}

function debugEnabled(): boolean {
  return process.env.DEBUG === "true" || currentLevel() >= levels.debug;
}

const colors = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  debug: chalk.gray,
};

export interface Logger {
  error(message: string, error?: unknown): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export const logger: Logger = {
  error: (message, error) => {
    if (currentLevel() >= levels.error) {
      console.error(colors.error(message), error ?? "");
    }
  },

  warn: (message, ...args) => {
    if (currentLevel() >= levels.warn) {
      console.warn(colors.warn(message), ...args);
    }
  },

  info: (message, ...args) => {
    if (currentLevel() >= levels.info) {
      console.log(colors.info(message), ...args);
    }
  },

  debug: (message, ...args) => {
    if (currentLevel() > levels.silent && debugEnabled()) {
      console.log(colors.debug(message), ...args);
    }
  },
};
