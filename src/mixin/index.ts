/**
 * Mixin loading facade:
 * - parser.ts: one file into metadata + script
 * - loader.ts: recursive resolution into a MixinGraph
 */

export { parseMixin, type MixinNode } from "./parser.js";
export { loadMixinGraph, resolveReferencePath, MixinArena, MixinGraph } from "./loader.js";
