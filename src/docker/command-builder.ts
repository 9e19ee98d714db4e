/**
 * Docker run command builder for mini-cross.
 *
 * Fluent builder; arguments are emitted in call order.
 *
 * Usage:
 *   const args = new DockerRunCommandBuilder("mini-cross-3f2a...")
 *     .withWorkdirMount("/home/me/project")
 *     .withInteractive()
 *     .withPublishes([{ hostPort: 8080, machinePort: 80 }])
 *     .build(["make", "check"]);
 */

import { X11_SOCKET_DIR } from "../constants.js";
import type { RunRequest } from "../interfaces/container-engine.js";
import { formatPublish, formatVolume, type Publish, type Volume } from "../runtime-params.js";

/**
 * Builder for docker run arguments.
 *
 * Produces a string[] without the engine binary, suitable for execa.
 */
export class DockerRunCommandBuilder {
  private readonly args: string[] = ["run", "--rm"];
  private readonly imageName: string;

  constructor(imageName: string) {
    this.imageName = imageName;
  }

  /** Bind-mount a host directory at the same path and make it the working directory. */
  withWorkdirMount(dir: string): this {
    this.args.push("-v", `${dir}:${dir}`, "-w", dir);
    return this;
  }

  withInteractive(): this {
    this.args.push("-it");
    return this;
  }

  /** Forward an X11 display and its socket directory. */
  withDisplay(display: string): this {
    this.args.push("-e", `DISPLAY=${display}`, "-v", `${X11_SOCKET_DIR}:${X11_SOCKET_DIR}`);
    return this;
  }

  withPublishes(publishes: Iterable<Publish>): this {
    for (const publish of publishes) {
      this.args.push("-p", formatPublish(publish));
    }
    return this;
  }

  withVolumes(volumes: Iterable<Volume>): this {
    for (const volume of volumes) {
      this.args.push("-v", formatVolume(volume));
    }
    return this;
  }

  withEnvironment(entries: Iterable<readonly [string, string]>): this {
    for (const [key, value] of entries) {
      this.args.push("-e", `${key}=${value}`);
    }
    return this;
  }

  /** Final argument list: options, image, then the container command. */
  build(command: readonly string[] = []): string[] {
    return [...this.args, this.imageName, ...command];
  }
}

/** docker run arguments for a RunRequest. */
export function buildRunArgs(request: RunRequest): string[] {
  const builder = new DockerRunCommandBuilder(request.tag).withWorkdirMount(request.workdir);
  if (request.interactive) {
    builder.withInteractive();
  }
  if (request.display) {
    builder.withDisplay(request.display);
  }
  return builder
    .withPublishes(request.publishes)
    .withVolumes(request.volumes)
    .withEnvironment(request.env)
    .build(request.command);
}
