/**
 * Error reporting for the CLI layer.
 *
 * Turns thrown errors and container exit codes into log output. Nothing here
 * decides the process exit status; callers do.
 */

import { MiniCrossError, ToolchainNotFoundError } from "./errors.js";
import { log } from "./logger.js";

/** Known container exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  125: {
    code: 125,
    description: "Container engine failed to start the container",
    suggestion: "Check the publish and volume arguments",
    severity: "error",
  },
  126: {
    code: 126,
    description: "Command not executable",
    suggestion: "Check file permissions (chmod +x)",
    severity: "error",
  },
  127: {
    code: 127,
    description: "Command not found",
    suggestion: "Add the package providing it to 'install:'",
    severity: "error",
  },
  130: {
    code: 130,
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    description: "Container was killed (OOM or manual stop)",
    severity: "warn",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      description: `Command exited with code ${code}`,
      severity: "warn",
    }
  );
}

/** Log a container exit code. Success is silent. */
export function logExitCode(code: number): void {
  if (code === 0) {
    return;
  }

  const info = getExitCodeInfo(code);
  switch (info.severity) {
    case "error":
      log.error(info.description);
      break;
    case "warn":
      log.warn(info.description);
      break;
    default:
      log.dim(info.description);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Report an error that ended the invocation.
 *
 * Known errors print their message; anything else is reported as unexpected.
 * The stack trace is shown at debug level.
 */
export function reportError(error: unknown): void {
  if (error instanceof ToolchainNotFoundError) {
    log.error("Toolchain not found in:");
    for (const path of error.searched) {
      log.dim(`- ${path}`);
    }
  } else if (error instanceof MiniCrossError) {
    log.error(error.message);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Unexpected error: ${message}`);
  }

  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}
