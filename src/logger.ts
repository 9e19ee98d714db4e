/**
 * Unified logging for mini-cross.
 *
 * All console output goes through this module and is styled with picocolors.
 * Dockerfile text printed by --dry-run uses `log.write`, which never styles
 * and ignores quiet mode and the level, so the output can be piped into
 * `docker build -f -` unchanged.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** Suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  quiet: false,
};

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: only the exit code communicates success or failure.
 * The container's own output is inherited by the engine and not affected.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

export function disableQuietMode(): void {
  config.quiet = false;
  config.level = LogLevel.INFO;
}

export function isQuiet(): boolean {
  return config.quiet;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function getLogLevel(): LogLevel {
  return config.level;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("docker image build --tag ...")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("Built mini-cross-...")
 */
export const log = {
  /** Shown only at DEBUG level. Styled dim. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(message));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  /** Yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /** Red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.bold(message));
    }
  },

  /** Write data to stdout without newline or styling. Always printed. */
  write(message: string): void {
    process.stdout.write(message);
  },
};
