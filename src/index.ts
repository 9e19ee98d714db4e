/**
 * mini-cross - run commands in containers synthesized from mixin toolchains.
 *
 * Library entry point; the `mc` binary lives in cli.ts.
 */

export { VERSION } from "./constants.js";
export {
  MiniCrossError,
  ConfigError,
  ValidationError,
  ToolchainNotFoundError,
  MixinError,
  MixinFormatError,
  MixinNotFoundError,
  CyclicMixinError,
  ConversionError,
  NoBaseError,
  MultipleBasesError,
  UnknownBaseError,
  DockerError,
  DockerNotFoundError,
  ImageBuildError,
} from "./errors.js";
export { parseMixin, loadMixinGraph, MixinGraph, type MixinNode } from "./mixin/index.js";
export {
  BuildSpec,
  Instruction,
  formatInstruction,
  convertToBuildSpec,
  systemConversionContext,
  resolvePackageManager,
  type BuildInstruction,
  type ConversionContext,
  type PackageManager,
} from "./dockerfile/index.js";
export {
  parsePublish,
  formatPublish,
  parseVolume,
  formatVolume,
  type Publish,
  type Volume,
} from "./runtime-params.js";
export { findToolchain, toolchainCandidates } from "./toolchain-lookup.js";
export { loadUserConfig, applyUserConfig } from "./config-file.js";
export { ensureImage, type ImageStatus } from "./build.js";
export { DockerEngine } from "./docker/index.js";
export type { ContainerEngine, RunRequest } from "./interfaces/container-engine.js";
export { run, type RunOptions, type RunDependencies } from "./commands/run.js";
