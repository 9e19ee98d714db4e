/**
 * Dockerfile synthesis facade:
 * - instruction.ts: instruction union and its text form
 * - build-spec.ts: instruction sequence, runtime params, content hash
 * - package-manager.ts: distro dialect tables
 * - converter.ts: mixin graph to BuildSpec
 */

export { Instruction, formatInstruction, type BuildInstruction } from "./instruction.js";
export { BuildSpec } from "./build-spec.js";
export {
  PACKAGE_MANAGERS,
  resolvePackageManager,
  installCommand,
  type PackageManager,
  type PackageManagerProfile,
} from "./package-manager.js";
export {
  convertToBuildSpec,
  systemConversionContext,
  listVisibleSubdirectories,
  scriptInstruction,
  pathDepth,
  type ConversionContext,
} from "./converter.js";
