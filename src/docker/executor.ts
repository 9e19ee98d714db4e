/**
 * Docker CLI implementation of the container engine contract.
 *
 * All engine processes flow through execa. Build and run inherit the
 * terminal, so build progress and the container's own output stream
 * straight to the user.
 */

import { execa, ExecaError } from "execa";

import { DEFAULT_ENGINE, DOCKER_COMMAND_TIMEOUT, MC_ENV } from "../constants.js";
import {
  DockerError,
  DockerNotFoundError,
  ImageBuildError,
  extractErrorDetails,
  isCommandNotFound,
} from "../errors.js";
import type { ContainerEngine, RunRequest } from "../interfaces/container-engine.js";
import { log } from "../logger.js";
import { buildRunArgs } from "./command-builder.js";

/** Engine binary from MINI_CROSS_ENGINE, defaulting to docker. */
export function resolveEngineBinary(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[MC_ENV.ENGINE]?.trim();
  return configured ? configured : DEFAULT_ENGINE;
}

export class DockerEngine implements ContainerEngine {
  readonly binary: string;

  constructor(binary: string = resolveEngineBinary()) {
    this.binary = binary;
  }

  private notFound(args: readonly string[]): DockerNotFoundError {
    return new DockerNotFoundError(`${this.binary} not found in PATH. Command: ${this.binary} ${args.slice(0, 3).join(" ")}...`);
  }

  async exists(tag: string): Promise<boolean> {
    const args = ["images", "-q", tag];
    try {
      const result = await execa(this.binary, args, { timeout: DOCKER_COMMAND_TIMEOUT });
      return result.stdout.trim() !== "";
    } catch (error: unknown) {
      if (isCommandNotFound(error)) {
        throw this.notFound(args);
      }
      if (error instanceof ExecaError && error.exitCode !== undefined) {
        log.debug(`${this.binary} images exited with ${error.exitCode}: ${extractErrorDetails(error)}`);
        return false;
      }
      throw new DockerError(`Failed to query image ${tag}: ${extractErrorDetails(error)}`);
    }
  }

  async build(tag: string, dockerfile: string): Promise<void> {
    // Dockerfile comes from stdin, the working directory is the build context
    const args = ["image", "build", "--tag", tag, "-f", "-", "."];
    log.debug(`${this.binary} ${args.join(" ")}`);

    try {
      await execa(this.binary, args, {
        input: dockerfile,
        stdout: "inherit",
        stderr: "inherit",
        env: { DOCKER_BUILDKIT: "1" },
      });
    } catch (error: unknown) {
      if (isCommandNotFound(error)) {
        throw this.notFound(args);
      }
      throw new ImageBuildError(`Failed to build ${tag}: ${extractErrorDetails(error)}`);
    }
  }

  async run(request: RunRequest): Promise<number> {
    const args = buildRunArgs(request);
    log.debug(`${this.binary} ${args.join(" ")}`);

    try {
      await execa(this.binary, args, { stdio: "inherit" });
      return 0;
    } catch (error: unknown) {
      if (isCommandNotFound(error)) {
        throw this.notFound(args);
      }
      if (error instanceof ExecaError && error.exitCode !== undefined) {
        return error.exitCode;
      }
      throw new DockerError(`Failed to run ${request.tag}: ${extractErrorDetails(error)}`);
    }
  }
}
