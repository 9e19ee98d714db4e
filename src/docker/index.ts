/**
 * Docker operations for mini-cross.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - executor.ts: DockerEngine (exists, build, run through execa)
 * - command-builder.ts: docker run argument construction
 */

export { DockerEngine, resolveEngineBinary } from "./executor.js";
export { DockerRunCommandBuilder, buildRunArgs } from "./command-builder.js";
