import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CyclicMixinError, MixinNotFoundError } from "../../src/errors.js";
import { loadMixinGraph, MixinArena, resolveReferencePath } from "../../src/mixin/loader.js";
import { makeTempDir, removeTempDir, writeTree } from "../helpers/fixtures.js";

describe("resolveReferencePath", () => {
  it("resolves relative to the referencing file", () => {
    expect(resolveReferencePath("project/mc.yaml", "tools/gcc")).toBe(join("project", "tools", "gcc.yaml"));
  });

  it("walks up with ..", () => {
    expect(resolveReferencePath("/p/.mc/arm/arm.yaml", "../common")).toBe("/p/.mc/common.yaml");
  });

  it("keeps absolute references", () => {
    expect(resolveReferencePath("/p/mc.yaml", "/opt/mixins/base")).toBe("/opt/mixins/base.yaml");
  });

  it("appends .yaml even when the name has a dot", () => {
    expect(resolveReferencePath("/p/mc.yaml", "gcc-13.2")).toBe("/p/gcc-13.2.yaml");
  });
});

describe("MixinArena", () => {
  it("rejects unknown indices", () => {
    expect(() => new MixinArena().get(0)).toThrow(RangeError);
  });
});

describe("loadMixinGraph", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("loads a file without mixins", () => {
    writeTree(dir, { "mc.yaml": "---\nbase: alpine:3.19\n---\n" });

    const graph = loadMixinGraph(join(dir, "mc.yaml"));

    expect(graph.root.path).toBe(join(dir, "mc.yaml"));
    expect(graph.children).toEqual([]);
    expect(graph.size).toBe(1);
  });

  it("flattens descendants before their parents and collapses diamonds", () => {
    writeTree(dir, {
      "mc.yaml": "---\nbase: ubuntu:22.04\nmixin: [b, c]\n---\n",
      "b.yaml": "---\nmixin: [lib/d]\n---\n",
      "c.yaml": "---\nmixin: [lib/d]\n---\n",
      "lib/d.yaml": "---\ninstall: [gcc]\n---\n",
    });

    const graph = loadMixinGraph(join(dir, "mc.yaml"));

    expect(graph.children.map((node) => node.path)).toEqual([
      join(dir, "lib", "d.yaml"),
      join(dir, "b.yaml"),
      join(dir, "c.yaml"),
    ]);
    expect(graph.size).toBe(4);
    expect(graph.mergeOrder().map((node) => node.path)).toEqual([
      join(dir, "lib", "d.yaml"),
      join(dir, "b.yaml"),
      join(dir, "c.yaml"),
      join(dir, "mc.yaml"),
    ]);
  });

  it("resolves nested references relative to the nested file", () => {
    writeTree(dir, {
      "mc.yaml": "---\nmixin: [lib/d]\n---\n",
      "lib/d.yaml": "---\nmixin: [e, ../top]\n---\n",
      "lib/e.yaml": "echo e\n",
      "top.yaml": "echo top\n",
    });

    const graph = loadMixinGraph(join(dir, "mc.yaml"));

    expect(graph.children.map((node) => node.path)).toEqual([
      join(dir, "lib", "e.yaml"),
      join(dir, "top.yaml"),
      join(dir, "lib", "d.yaml"),
    ]);
  });

  it("rejects a cycle with the full chain", () => {
    writeTree(dir, {
      "a.yaml": "---\nmixin: [b]\n---\n",
      "b.yaml": "---\nmixin: [a]\n---\n",
    });
    const a = join(dir, "a.yaml");
    const b = join(dir, "b.yaml");

    expect(() => loadMixinGraph(a)).toThrow(new CyclicMixinError([a, b, a]));
    expect(() => loadMixinGraph(a)).toThrow(`Cyclic mixin reference: ${a} -> ${b} -> ${a}`);
  });

  it("rejects a self reference", () => {
    writeTree(dir, { "a.yaml": "---\nmixin: [a]\n---\n" });
    expect(() => loadMixinGraph(join(dir, "a.yaml"))).toThrow(CyclicMixinError);
  });

  it("names the referencing file when a mixin is missing", () => {
    writeTree(dir, { "mc.yaml": "---\nmixin: [nope]\n---\n" });

    expect(() => loadMixinGraph(join(dir, "mc.yaml"))).toThrow(
      `Failed to read mixin ${join(dir, "nope.yaml")} (referenced by ${join(dir, "mc.yaml")})`
    );
  });

  it("rejects a missing root", () => {
    expect(() => loadMixinGraph(join(dir, "missing.yaml"))).toThrow(MixinNotFoundError);
  });
});
