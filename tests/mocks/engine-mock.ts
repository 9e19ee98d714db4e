/**
 * In-process container engine for unit tests.
 *
 * Records every call and answers from configurable state, so the build/run
 * workflow can be verified without Docker.
 */

import type { ContainerEngine, RunRequest } from "../../src/interfaces/container-engine.js";

export interface RecordedBuild {
  tag: string;
  dockerfile: string;
}

export class EngineMockRecorder implements ContainerEngine {
  /** Tags reported as present in the image store. */
  readonly images = new Set<string>();
  readonly existsCalls: string[] = [];
  readonly builds: RecordedBuild[] = [];
  readonly runs: RunRequest[] = [];

  /** Exit code returned by run(). */
  exitCode = 0;
  /** Error thrown by build(), if set. */
  buildError?: Error;

  async exists(tag: string): Promise<boolean> {
    this.existsCalls.push(tag);
    return this.images.has(tag);
  }

  async build(tag: string, dockerfile: string): Promise<void> {
    this.builds.push({ tag, dockerfile });
    if (this.buildError) {
      throw this.buildError;
    }
    this.images.add(tag);
  }

  async run(request: RunRequest): Promise<number> {
    this.runs.push(request);
    return this.exitCode;
  }

  reset(): void {
    this.images.clear();
    this.existsCalls.length = 0;
    this.builds.length = 0;
    this.runs.length = 0;
    this.exitCode = 0;
    this.buildError = undefined;
  }
}
