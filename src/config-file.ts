/**
 * User configuration files for mini-cross.
 *
 * Runtime parameters that apply to every toolchain: published ports,
 * volumes and environment variables. Files are layered, all that exist
 * are loaded, in this order:
 *
 *   1. ~/.mc2config.yaml
 *   2. ~/.config/mc2/config.yaml
 *   3. ./.mc2config.yaml
 *   4. ./.mc2/.mc2config.yaml
 *
 * Publishes and volumes accumulate; env keys from later files override
 * earlier ones. None of it affects the image tag.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, schemas.ts, logger.ts
 *   It should NOT import from: cli, commands, docker
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";

import type { z } from "zod";

import {
  USER_CONFIG_DIR,
  USER_CONFIG_FILE,
  XDG_CONFIG_FILE,
  XDG_CONFIG_SUBDIR,
} from "./constants.js";
import type { BuildSpec } from "./dockerfile/index.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import { formatZodIssues, parseYamlText, UserConfigSchema, type UserConfig } from "./schemas.js";

/**
 * Read and validate a YAML file.
 *
 * @throws ConfigError if the file cannot be read, is not YAML or fails the schema.
 */
export function loadYamlFile<T extends z.ZodTypeAny>(path: string, schema: T): z.output<T> {
  let raw: unknown;
  try {
    raw = parseYamlText(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config ${path}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/** Config file locations, lowest precedence first. */
export function userConfigPaths(home: string = homedir(), cwd = "."): string[] {
  return [
    join(home, USER_CONFIG_FILE),
    join(home, ".config", XDG_CONFIG_SUBDIR, XDG_CONFIG_FILE),
    join(cwd, USER_CONFIG_FILE),
    join(cwd, USER_CONFIG_DIR, USER_CONFIG_FILE),
  ];
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/** Relative volume host paths are relative to the file that declares them. */
function resolveVolumePaths(config: UserConfig, path: string): UserConfig {
  const base = dirname(path);
  return {
    ...config,
    volume: config.volume.map((volume) =>
      isAbsolute(volume.hostPath) ? volume : { ...volume, hostPath: resolve(base, volume.hostPath) }
    ),
  };
}

/** Combine layered configs: lists concatenate, env keys are overridden. */
export function mergeUserConfigs(configs: readonly UserConfig[]): UserConfig {
  const result: UserConfig = { publish: [], volume: [], env: {} };
  for (const config of configs) {
    result.publish.push(...config.publish);
    result.volume.push(...config.volume);
    result.env = { ...result.env, ...config.env };
  }
  return result;
}

/**
 * Load and merge all user config files that exist.
 *
 * @throws ConfigError if any existing file is malformed.
 */
export function loadUserConfig(home: string = homedir(), cwd = "."): UserConfig {
  const configs: UserConfig[] = [];
  for (const path of userConfigPaths(home, cwd)) {
    if (!isFile(path)) {
      continue;
    }
    log.debug(`Loaded user config: ${path}`);
    configs.push(resolveVolumePaths(loadYamlFile(path, UserConfigSchema), path));
  }
  return mergeUserConfigs(configs);
}

/** Append a user config's runtime parameters to a build spec. */
export function applyUserConfig(spec: BuildSpec, config: UserConfig): void {
  spec.addPublishes(config.publish);
  spec.addVolumes(config.volume);
  for (const [key, value] of Object.entries(config.env)) {
    spec.addEnv(key, value);
  }
}
