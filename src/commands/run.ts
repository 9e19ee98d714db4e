/**
 * The `mc` workflow: locate the toolchain, synthesize its Dockerfile, make
 * sure the image exists and run the command in it.
 *
 * Runtime parameters are applied in the order mixins, user config, command
 * line. Process-level state (cwd, TTY, DISPLAY, host identity) is gathered
 * once by defaultRunDependencies so the workflow itself can run against a
 * fake engine.
 */

import { ensureImage } from "../build.js";
import { applyUserConfig, loadUserConfig } from "../config-file.js";
import { MC_ENV } from "../constants.js";
import { DockerEngine } from "../docker/index.js";
import { convertToBuildSpec, systemConversionContext, type ConversionContext } from "../dockerfile/index.js";
import { logExitCode } from "../error-handler.js";
import type { ContainerEngine } from "../interfaces/container-engine.js";
import { log } from "../logger.js";
import { loadMixinGraph } from "../mixin/index.js";
import { parsePublish, parseVolume } from "../runtime-params.js";
import type { UserConfig } from "../schemas.js";
import { findToolchain } from "../toolchain-lookup.js";
import { parseEnvVarStrict } from "../validation.js";

export interface RunOptions {
  /** Toolchain name; the default toolchain when absent */
  machine?: string;
  /** Command run in the container; the image's entrypoint when empty */
  command: readonly string[];
  /** Print the Dockerfile instead of building and running */
  dryRun?: boolean;
  /** Rebuild even when the image exists */
  force?: boolean;
  publish?: readonly string[];
  volume?: readonly string[];
  env?: readonly string[];
  /** Directory toolchain lookup starts from (default: cwd) */
  root?: string;
}

export interface RunDependencies {
  engine: ContainerEngine;
  context: ConversionContext;
  userConfig: UserConfig;
  workdir: string;
  interactive: boolean;
  display?: string;
}

export function defaultRunDependencies(): RunDependencies {
  return {
    engine: new DockerEngine(),
    context: systemConversionContext(),
    userConfig: loadUserConfig(),
    workdir: process.cwd(),
    interactive: process.stdin.isTTY === true,
    display: process.env[MC_ENV.DISPLAY] || undefined,
  };
}

/**
 * Run the workflow.
 *
 * @returns The container's exit code, or 0 for a dry run.
 * @throws ValidationError for malformed --publish, --volume or --env values.
 * @throws MiniCrossError subclasses from lookup, loading, conversion or the engine.
 */
export async function run(options: RunOptions, deps: RunDependencies): Promise<number> {
  const publishes = (options.publish ?? []).map(parsePublish);
  const volumes = (options.volume ?? []).map(parseVolume);
  const env = (options.env ?? []).map(parseEnvVarStrict);

  const toolchain = findToolchain(options.machine, options.root);
  log.debug(`Toolchain: ${toolchain}`);

  const graph = loadMixinGraph(toolchain);
  log.debug(`Resolved ${graph.size} file(s)`);

  const spec = convertToBuildSpec(graph, deps.context);
  applyUserConfig(spec, deps.userConfig);
  spec.addPublishes(publishes).addVolumes(volumes);
  for (const { key, value } of env) {
    spec.addEnv(key, value);
  }

  if (options.dryRun) {
    log.write(spec.toDockerfile());
    return 0;
  }

  await ensureImage(deps.engine, spec, { force: options.force });

  const exitCode = await deps.engine.run({
    tag: spec.tag(),
    command: options.command,
    publishes: spec.publishes,
    volumes: spec.volumes,
    env: spec.env,
    workdir: deps.workdir,
    interactive: deps.interactive,
    display: deps.display,
  });
  logExitCode(exitCode);
  return exitCode;
}
