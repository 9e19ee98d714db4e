/**
 * Unified exception hierarchy for mini-cross.
 *
 * All custom exceptions inherit from MiniCrossError for consistent error handling.
 * CLI catches these and converts to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other mini-cross modules.
 */

/**
 * Base exception for all mini-cross errors.
 *
 * Every failure is fatal for the invocation; the CLI layer reports the
 * message and exits non-zero.
 */
export class MiniCrossError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MiniCrossError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Malformed user config file (~/.mc2config.yaml)
 *   - Malformed alias file
 */
export class ConfigError extends MiniCrossError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Invalid --publish / --volume syntax
 *   - Invalid --env key
 */
export class ValidationError extends MiniCrossError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Raised when no toolchain file exists at any lookup location. */
export class ToolchainNotFoundError extends MiniCrossError {
  readonly searched: readonly string[];

  constructor(searched: readonly string[]) {
    super(`Toolchain not found in: ${searched.join(", ")}`);
    this.name = "ToolchainNotFoundError";
    this.searched = searched;
  }
}

/** Base class for errors raised while loading and resolving mixin files. */
export class MixinError extends MiniCrossError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = "MixinError";
    this.path = path;
  }
}

/** Malformed toolchain file: empty, unterminated metadata, invalid YAML or fields. */
export class MixinFormatError extends MixinError {
  constructor(path: string, detail: string) {
    super(path, `Invalid toolchain file ${path}: ${detail}`);
    this.name = "MixinFormatError";
  }
}

/** A toolchain or referenced mixin file could not be read. */
export class MixinNotFoundError extends MixinError {
  readonly referencedBy?: string;

  constructor(path: string, referencedBy?: string, cause?: string) {
    const from = referencedBy ? ` (referenced by ${referencedBy})` : "";
    const reason = cause ? `: ${cause}` : "";
    super(path, `Failed to read mixin ${path}${from}${reason}`);
    this.name = "MixinNotFoundError";
    this.referencedBy = referencedBy;
  }
}

/** A mixin reference leads back to a file still being resolved. */
export class CyclicMixinError extends MixinError {
  readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    const last = chain[chain.length - 1] ?? "";
    super(last, `Cyclic mixin reference: ${chain.join(" -> ")}`);
    this.name = "CyclicMixinError";
    this.chain = chain;
  }
}

/**
 * Dockerfile synthesis errors.
 *
 * Raised before any instruction is emitted, so no partial spec exists.
 */
export class ConversionError extends MiniCrossError {
  constructor(message: string) {
    super(message);
    this.name = "ConversionError";
  }
}

/** No file in the resolved tree declares `base:`. */
export class NoBaseError extends ConversionError {
  constructor() {
    super("No image source has been found! Please define 'base:'");
    this.name = "NoBaseError";
  }
}

/** More than one file in the resolved tree declares `base:`. */
export class MultipleBasesError extends ConversionError {
  readonly first: string;
  readonly second: string;

  constructor(first: string, second: string) {
    super(`'base:' found in multiple files: ${first}, ${second}`);
    this.name = "MultipleBasesError";
    this.first = first;
    this.second = second;
  }
}

/** The base image does not map to a known package manager. */
export class UnknownBaseError extends ConversionError {
  readonly base: string;

  constructor(base: string) {
    super(`Invalid base: ${base}`);
    this.name = "UnknownBaseError";
    this.base = base;
  }
}

/**
 * Container engine errors.
 *
 * Base class for all Docker-related exceptions.
 */
export class DockerError extends MiniCrossError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when the engine binary is not installed or not in PATH. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Docker not found in PATH") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when Docker image build fails. */
export class ImageBuildError extends DockerError {
  constructor(message: string) {
    super(message);
    this.name = "ImageBuildError";
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

/** Check if an error (or its cause) means the spawned binary does not exist. */
export function isCommandNotFound(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if ("code" in error && error.code === "ENOENT") {
    return true;
  }
  return "cause" in error && isCommandNotFound(error.cause);
}
