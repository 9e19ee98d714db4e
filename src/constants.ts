/**
 * Constants module for mini-cross.
 *
 * File names, naming prefixes and timeouts are defined here (SSOT).
 */

import { readFileSync } from "node:fs";

import { z } from "zod";

// === Version (SSOT: package.json) ===
const PackageJsonSchema = z.object({ version: z.string() });
export const VERSION: string = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
).version;

// === Image naming ===
/** Namespace of every content-addressed image tag: `mini-cross-<sha256>`. */
export const IMAGE_TAG_PREFIX = "mini-cross";

// === Toolchain file format ===
export const METADATA_DELIMITER = "---";
export const MIXIN_EXTENSION = ".yaml";

// === Lookup locations (relative to the working directory) ===
export const TOOLCHAIN_DIR = ".mc";
export const DEFAULT_TOOLCHAIN_FILE = "mc.yaml";
export const ALIAS_FILE = ".mc2aliases.yaml";

// === User config files ===
export const USER_CONFIG_FILE = ".mc2config.yaml";
export const USER_CONFIG_DIR = ".mc2";
export const XDG_CONFIG_SUBDIR = "mc2";
export const XDG_CONFIG_FILE = "config.yaml";

// === Docker ===
export const DOCKER_COMMAND_TIMEOUT = 30_000; // Quick docker commands (images -q)
export const X11_SOCKET_DIR = "/tmp/.X11-unix";

// === Environment variables (SSOT for names) ===
export const MC_ENV = {
  /** Container engine binary (docker, podman). */
  ENGINE: "MINI_CROSS_ENGINE",
  DISPLAY: "DISPLAY",
} as const;

export const DEFAULT_ENGINE = "docker";
