/**
 * Mixin resolution.
 *
 * Loads a toolchain file and every mixin it references, transitively, into
 * an arena of parsed nodes, each file once, identified by normalized path.
 * The root's flattened children are index references into the arena, in
 * resolution order:
 *
 *   A -> [B, C], B -> [D], C -> [D]   resolves to   D, B, C   (then A)
 *
 * Each reference contributes its own descendants followed by itself; a path
 * already in the list is skipped, so diamonds collapse to the first
 * encounter. References that lead back to a file still being resolved are
 * rejected as cycles.
 */

import { readFileSync } from "node:fs";
import { basename, dirname, isAbsolute, join, normalize } from "node:path";

import { MIXIN_EXTENSION } from "../constants.js";
import { CyclicMixinError, MixinNotFoundError } from "../errors.js";
import { log } from "../logger.js";
import { parseMixin, type MixinNode } from "./parser.js";

/** Parsed nodes stored once each, addressed by index. */
export class MixinArena {
  private readonly nodes: MixinNode[] = [];

  add(node: MixinNode): number {
    const index = this.nodes.length;
    this.nodes.push(node);
    return index;
  }

  get(index: number): MixinNode {
    const node = this.nodes[index];
    if (node === undefined) {
      throw new RangeError(`No mixin at index ${index}`);
    }
    return node;
  }

  get size(): number {
    return this.nodes.length;
  }
}

/** A fully resolved toolchain: root node plus its flattened descendants. */
export class MixinGraph {
  constructor(
    private readonly arena: MixinArena,
    readonly rootIndex: number,
    readonly childIndices: readonly number[]
  ) {}

  get root(): MixinNode {
    return this.arena.get(this.rootIndex);
  }

  /** Flattened descendants in resolution order (root excluded). */
  get children(): MixinNode[] {
    return this.childIndices.map((index) => this.arena.get(index));
  }

  /** Number of distinct files loaded, root included. */
  get size(): number {
    return this.arena.size;
  }

  /** Descendants followed by the root, last. */
  mergeOrder(): MixinNode[] {
    return [...this.children, this.root];
  }
}

/**
 * Path of a mixin reference: relative to the referencing file's directory,
 * with `.yaml` appended to the last segment.
 */
export function resolveReferencePath(fromPath: string, reference: string): string {
  const target = join(dirname(reference), `${basename(reference)}${MIXIN_EXTENSION}`);
  return isAbsolute(target) ? normalize(target) : join(dirname(fromPath), target);
}

function readMixin(path: string, referencedBy?: string): MixinNode {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new MixinNotFoundError(path, referencedBy, error instanceof Error ? error.message : String(error));
  }
  log.debug(`Loaded mixin ${path}`);
  return parseMixin(path, content);
}

function resolveReferences(
  arena: MixinArena,
  parentIndex: number,
  chain: readonly string[],
  resolved: { indices: number[]; paths: Set<string> }
): void {
  const parent = arena.get(parentIndex);

  for (const reference of parent.config.mixin) {
    const path = resolveReferencePath(parent.path, reference);
    if (chain.includes(path)) {
      throw new CyclicMixinError([...chain, path]);
    }
    if (resolved.paths.has(path)) {
      continue;
    }

    const index = arena.add(readMixin(path, parent.path));
    resolveReferences(arena, index, [...chain, path], resolved);
    resolved.indices.push(index);
    resolved.paths.add(path);
  }
}

/**
 * Load a toolchain file and resolve its mixins.
 *
 * @param path - Toolchain file path (relative paths stay relative).
 * @throws MixinNotFoundError if any file in the tree cannot be read.
 * @throws MixinFormatError if any file in the tree is malformed.
 * @throws CyclicMixinError on a reference cycle.
 */
export function loadMixinGraph(path: string): MixinGraph {
  const rootPath = normalize(path);
  const arena = new MixinArena();
  const rootIndex = arena.add(readMixin(rootPath));

  const resolved: { indices: number[]; paths: Set<string> } = { indices: [], paths: new Set() };
  resolveReferences(arena, rootIndex, [rootPath], resolved);

  return new MixinGraph(arena, rootIndex, resolved.indices);
}
