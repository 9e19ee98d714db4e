/**
 * Container engine contract.
 *
 * The build/run workflow only talks to this interface; DockerEngine
 * implements it with the docker CLI and tests substitute a recorder.
 */

import type { Publish, Volume } from "../runtime-params.js";

/** Everything `docker run` needs besides the engine binary. */
export interface RunRequest {
  /** Image tag to run */
  readonly tag: string;
  /** Command and arguments executed in the container (image default when empty) */
  readonly command: readonly string[];
  readonly publishes: readonly Publish[];
  readonly volumes: readonly Volume[];
  readonly env: readonly (readonly [string, string])[];
  /** Host directory mounted at the identical path and used as working directory */
  readonly workdir: string;
  /** Allocate a TTY and keep stdin open (-it) */
  readonly interactive: boolean;
  /** Host X11 display to forward, if any */
  readonly display?: string;
}

export interface ContainerEngine {
  /** True if an image with this tag is present in the local store. */
  exists(tag: string): Promise<boolean>;
  /**
   * Build an image from Dockerfile text.
   * Rejects with ImageBuildError on a non-zero build.
   */
  build(tag: string, dockerfile: string): Promise<void>;
  /** Run a container to completion and resolve with its exit code. */
  run(request: RunRequest): Promise<number>;
}
