/**
 * Build-cache policy for mini-cross.
 *
 * Images are tagged by the hash of their Dockerfile text, so an existing
 * tag is an up-to-date image. Builds happen only when the tag is missing or
 * a rebuild is forced.
 */

import type { BuildSpec } from "./dockerfile/index.js";
import type { ContainerEngine } from "./interfaces/container-engine.js";
import { log } from "./logger.js";

export interface EnsureImageOptions {
  /** Rebuild even if an image with the tag exists. */
  force?: boolean;
}

export type ImageStatus = "cached" | "built";

/**
 * Ensure the image for a build spec is in the engine's store.
 *
 * @returns "cached" when the build was skipped, "built" otherwise.
 * @throws ImageBuildError from the engine when the build fails.
 */
export async function ensureImage(
  engine: ContainerEngine,
  spec: BuildSpec,
  options: EnsureImageOptions = {}
): Promise<ImageStatus> {
  const tag = spec.tag();

  if (options.force) {
    log.dim("Force rebuild of image...");
  } else if (await engine.exists(tag)) {
    log.dim("Image already exists, skipping build...");
    return "cached";
  }

  log.bold(`Building ${tag}...`);
  await engine.build(tag, spec.toDockerfile());
  log.success(`Built ${tag}`);
  return "built";
}
