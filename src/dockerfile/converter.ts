/**
 * Mixin graph to build specification.
 *
 * Walks the merge order (descendants, then root), validates the single
 * `base:`, merges installs and scripts with first-writer-wins
 * de-duplication and emits instructions in a fixed order:
 *
 *   FROM, upgrade, UTF-8 locale, sudo, installs per mixin, user,
 *   context dirs, scripts per mixin, entrypoint placeholder
 *
 * Host identity and directory listing are injected through
 * ConversionContext so synthesis is deterministic under test.
 */

import { readdirSync } from "node:fs";
import { dirname, isAbsolute, join, sep } from "node:path";

import { MultipleBasesError, NoBaseError } from "../errors.js";
import { getHostIdentity, type HostIdentity } from "../host-identity.js";
import type { MixinGraph, MixinNode } from "../mixin/index.js";
import { BuildSpec } from "./build-spec.js";
import { Instruction, type BuildInstruction } from "./instruction.js";
import {
  bootstrapInstructions,
  installCommand,
  resolvePackageManager,
  upgradeInstructions,
} from "./package-manager.js";

export interface ConversionContext {
  readonly identity: HostIdentity;
  /** Names of the immediate, non-hidden subdirectories of `dir`. */
  listContextDirs(dir: string): string[];
}

/** Directory names sorted, so the COPY order (and the hash) is stable. */
export function listVisibleSubdirectories(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();
}

export function systemConversionContext(): ConversionContext {
  return {
    identity: getHostIdentity(),
    listContextDirs: listVisibleSubdirectories,
  };
}

/** Number of path components in a directory; the root `/` counts as one. */
export function pathDepth(dir: string): number {
  const parts = dir.split(sep).filter((part) => part !== "" && part !== ".");
  return isAbsolute(dir) ? parts.length + 1 : parts.length;
}

interface InstallBatch {
  readonly source: MixinNode;
  readonly packages: string[];
}

interface ScriptEntry {
  readonly source: MixinNode;
  readonly script: string;
}

function findBase(mixins: readonly MixinNode[]): string {
  let baseSource: MixinNode | undefined;
  for (const mixin of mixins) {
    if (mixin.config.base === undefined) {
      continue;
    }
    if (baseSource !== undefined) {
      throw new MultipleBasesError(baseSource.path, mixin.path);
    }
    baseSource = mixin;
  }

  const base = baseSource?.config.base;
  if (base === undefined) {
    throw new NoBaseError();
  }
  return base;
}

/** Keep each package only in the first mixin (in merge order) that lists it. */
function mergeInstalls(mixins: readonly MixinNode[]): InstallBatch[] {
  const seen = new Set<string>();
  const batches: InstallBatch[] = [];

  for (const mixin of mixins) {
    const packages: string[] = [];
    for (const name of mixin.config.install) {
      if (!seen.has(name)) {
        seen.add(name);
        packages.push(name);
      }
    }
    if (packages.length > 0) {
      batches.push({ source: mixin, packages });
    }
  }
  return batches;
}

function collectScripts(mixins: readonly MixinNode[]): ScriptEntry[] {
  const scripts: ScriptEntry[] = [];
  for (const mixin of mixins) {
    if (mixin.script !== undefined && mixin.script !== "") {
      scripts.push({ source: mixin, script: mixin.script });
    }
  }
  return scripts;
}

function userInstructions(identity: HostIdentity): BuildInstruction[] {
  const { uid, gid, userName, groupName } = identity;
  return [
    Instruction.comment("Configure user"),
    Instruction.run(`groupadd --gid ${gid} ${groupName}`),
    Instruction.run(`useradd --gid ${gid} --uid ${uid} --home /home/${userName} ${userName}`),
    Instruction.run(`mkdir -p /home/${userName}`),
    Instruction.run(`chown ${uid}:${gid} /home/${userName}`),
    Instruction.user(uid, gid),
  ];
}

function contextDirInstructions(rootPath: string, context: ConversionContext): BuildInstruction[] {
  const dir = dirname(rootPath);
  if (pathDepth(dir) < 2) {
    return [];
  }

  const names = context.listContextDirs(dir);
  if (names.length === 0) {
    return [];
  }
  return [
    Instruction.comment("Adding context dirs"),
    ...names.map((name) => Instruction.copy(join(dir, name), `/${name}`)),
  ];
}

/**
 * Heredoc RUN that hands the script to the image's shell verbatim.
 * The delimiter grows until no script line collides with it.
 */
export function scriptInstruction(script: string): BuildInstruction {
  const lines = new Set(script.split("\n"));
  let delimiter = "EOR";
  while (lines.has(delimiter)) {
    delimiter = `${delimiter}_`;
  }
  return Instruction.run(`<<${delimiter}\n${script}\n${delimiter}`);
}

/**
 * Convert a resolved mixin graph into a build specification.
 *
 * @throws MultipleBasesError if two files declare `base:`.
 * @throws NoBaseError if no file declares `base:`.
 * @throws UnknownBaseError if the base maps to no known package manager.
 */
export function convertToBuildSpec(graph: MixinGraph, context: ConversionContext): BuildSpec {
  const mixins = graph.mergeOrder();

  const base = findBase(mixins);
  const packageManager = resolvePackageManager(base);
  const installs = mergeInstalls(mixins);
  const scripts = collectScripts(mixins);

  const spec = new BuildSpec();
  for (const mixin of mixins) {
    spec.addPublishes(mixin.config.publish);
    spec.addVolumes(mixin.config.volume);
    for (const [key, value] of Object.entries(mixin.config.env)) {
      spec.addEnv(key, value);
    }
  }

  spec.add(Instruction.from(base));
  spec.addAll(upgradeInstructions(packageManager));
  spec.addAll(bootstrapInstructions(packageManager));

  for (const { source, packages } of installs) {
    spec.add(Instruction.comment(`Installs from: ${source.path}`));
    spec.add(installCommand(packageManager, packages));
  }

  spec.addAll(userInstructions(context.identity));
  spec.addAll(contextDirInstructions(graph.root.path, context));

  for (const { source, script } of scripts) {
    spec.add(Instruction.comment(`Exec script from: ${source.path}`));
    spec.add(scriptInstruction(script));
  }

  spec.add(Instruction.comment("Exec bash as entrypoint"));
  spec.add(Instruction.run("/usr/bin/env bash"));

  return spec;
}
