/**
 * Toolchain file lookup.
 *
 * Search order, relative to the working directory:
 *
 *   mc                  mc.yaml, .mc/mc.yaml
 *   mc <machine>        alias target, <machine>.yaml, .mc/<machine>.yaml,
 *                       .mc/<machine>/<machine>.yaml
 *
 * Aliases come from the first alias file (.mc2aliases.yaml, then
 * .mc/.mc2aliases.yaml) that defines the machine name. Targets are relative
 * to the alias file and always end in `.yaml`.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, schemas.ts, config-file.ts
 *   It should NOT import from: cli, commands, docker
 */

import { existsSync, statSync } from "node:fs";
import { dirname, extname, join } from "node:path";

import { loadYamlFile } from "./config-file.js";
import { ALIAS_FILE, DEFAULT_TOOLCHAIN_FILE, MIXIN_EXTENSION, TOOLCHAIN_DIR } from "./constants.js";
import { ToolchainNotFoundError } from "./errors.js";
import { log } from "./logger.js";
import { AliasFileSchema } from "./schemas.js";

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/** `tools/arm.yml` -> `tools/arm.yaml`, `tools/arm` -> `tools/arm.yaml`. */
export function withYamlExtension(path: string): string {
  const ext = extname(path);
  const stem = ext ? path.slice(0, -ext.length) : path;
  return `${stem}${MIXIN_EXTENSION}`;
}

/**
 * Resolve a machine name through the alias files.
 *
 * @returns Target path, or undefined if no alias file defines the name.
 * @throws ConfigError if an existing alias file is malformed.
 */
export function aliasTarget(machine: string, root = "."): string | undefined {
  for (const aliasFile of [join(root, ALIAS_FILE), join(root, TOOLCHAIN_DIR, ALIAS_FILE)]) {
    if (!isFile(aliasFile)) {
      continue;
    }
    const target = loadYamlFile(aliasFile, AliasFileSchema)[machine];
    if (target !== undefined) {
      log.debug(`Alias ${machine} -> ${target} (${aliasFile})`);
      return withYamlExtension(join(dirname(aliasFile), target));
    }
  }
  return undefined;
}

/** Every location searched for a toolchain, in priority order. */
export function toolchainCandidates(machine?: string, root = "."): string[] {
  if (machine === undefined) {
    return [join(root, DEFAULT_TOOLCHAIN_FILE), join(root, TOOLCHAIN_DIR, DEFAULT_TOOLCHAIN_FILE)];
  }

  const fileName = `${machine}${MIXIN_EXTENSION}`;
  const candidates = [
    join(root, fileName),
    join(root, TOOLCHAIN_DIR, fileName),
    join(root, TOOLCHAIN_DIR, machine, fileName),
  ];
  const alias = aliasTarget(machine, root);
  return alias !== undefined ? [alias, ...candidates] : candidates;
}

/**
 * First existing toolchain file for a machine name.
 *
 * @throws ToolchainNotFoundError listing every searched path.
 */
export function findToolchain(machine?: string, root = "."): string {
  const candidates = toolchainCandidates(machine, root);
  const found = candidates.find(isFile);
  if (found === undefined) {
    throw new ToolchainNotFoundError(candidates);
  }
  return found;
}
