/**
 * consola logger shared by every module, one tag per module.
 *
 * LOG_LEVEL (or setLogLevel) picks the threshold: debug, info, warn (default),
 * error or silent.
 */

import { createConsola, LogLevels } from "consola";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevelName, number> = {
  debug: LogLevels.debug,
  info: LogLevels.info,
  warn: LogLevels.warn,
  error: LogLevels.error,
  silent: LogLevels.silent,
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LEVELS;
}

function levelFromEnv(value: string | undefined): number {
  const name = (value ?? "").trim().toLowerCase();
  return isLogLevelName(name) ? LEVELS[name] : LogLevels.warn;
}

// stdout belongs to clack; everything logged goes to stderr
const base = createConsola({
  level: levelFromEnv(process.env.LOG_LEVEL),
  stderr: process.stderr,
});
base.options.stdout = process.stderr;

/** Called once --verbose is known */
export function setLogLevel(name: LogLevelName) {
  base.level = LEVELS[name];
}

const TAGS = {
  cli: "CLI",
  onboarding: "ONBOARD",
  chat: "CHAT",
  directory: "DIR",
  gmail: "GMAIL",
  calendar: "CAL",
  asana: "ASANA",
  google: "GOOGLE",
  config: "CONFIG",
} as const satisfies Record<string, string>;

export type LogModule = keyof typeof TAGS;

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(module: LogModule): Logger {
  const prefix = `[${TAGS[module]}]`;
  return {
    debug: (...args) => base.debug(prefix, ...args),
    info: (...args) => base.info(prefix, ...args),
    warn: (...args) => base.warn(prefix, ...args),
    error: (...args) => base.error(prefix, ...args),
  };
}

export const logger: Record<LogModule, Logger> = {
  cli: createLogger("cli"),
  onboarding: createLogger("onboarding"),
  chat: createLogger("chat"),
  directory: createLogger("directory"),
  gmail: createLogger("gmail"),
  calendar: createLogger("calendar"),
  asana: createLogger("asana"),
  google: createLogger("google"),
  config: createLogger("config"),
};
