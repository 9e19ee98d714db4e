import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { run, type RunDependencies } from "../../src/commands/run.js";
import { convertToBuildSpec } from "../../src/dockerfile/index.js";
import { ToolchainNotFoundError, ValidationError } from "../../src/errors.js";
import { disableQuietMode, enableQuietMode } from "../../src/logger.js";
import { loadMixinGraph } from "../../src/mixin/index.js";
import { makeTempDir, removeTempDir, testContext, writeTree } from "../helpers/fixtures.js";
import { EngineMockRecorder } from "../mocks/engine-mock.js";

const TOOLCHAIN = "---\nbase: alpine:3.19\ninstall: [make]\npublish: ['3000:3000']\nenv:\n  FROM_MIXIN: '1'\n---\n";

describe("run", () => {
  let dir: string;
  let engine: EngineMockRecorder;
  let deps: RunDependencies;

  beforeEach(() => {
    dir = makeTempDir();
    writeTree(dir, { "mc.yaml": TOOLCHAIN });
    engine = new EngineMockRecorder();
    deps = {
      engine,
      context: testContext(),
      userConfig: {
        publish: [{ hostPort: 4000, machinePort: 4000 }],
        volume: [],
        env: { FROM_USER: "1" },
      },
      workdir: "/src",
      interactive: false,
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    disableQuietMode();
    removeTempDir(dir);
  });

  function expectedTag(): string {
    return convertToBuildSpec(loadMixinGraph(join(dir, "mc.yaml")), testContext()).tag();
  }

  it("builds the image and runs the command with every runtime parameter", async () => {
    const code = await run(
      {
        command: ["make", "test"],
        root: dir,
        publish: ["5000:5000"],
        volume: ["/data:/data:ro"],
        env: ["FROM_CLI=1"],
      },
      deps
    );

    expect(code).toBe(0);
    expect(engine.builds.map((build) => build.tag)).toEqual([expectedTag()]);
    expect(engine.runs).toEqual([
      {
        tag: expectedTag(),
        command: ["make", "test"],
        publishes: [
          { hostPort: 3000, machinePort: 3000 },
          { hostPort: 4000, machinePort: 4000 },
          { hostPort: 5000, machinePort: 5000 },
        ],
        volumes: [{ hostPath: "/data", machinePath: "/data", options: ["ro"] }],
        env: [
          ["FROM_MIXIN", "1"],
          ["FROM_USER", "1"],
          ["FROM_CLI", "1"],
        ],
        workdir: "/src",
        interactive: false,
        display: undefined,
      },
    ]);
  });

  it("reuses a cached image", async () => {
    engine.images.add(expectedTag());

    await run({ command: [], root: dir }, deps);

    expect(engine.builds).toEqual([]);
    expect(engine.runs).toHaveLength(1);
  });

  it("keeps the tag when only runtime parameters change", async () => {
    await run({ command: [], root: dir }, deps);
    await run({ command: [], root: dir, publish: ["8080:80"] }, { ...deps, userConfig: { publish: [], volume: [], env: {} } });

    expect(engine.builds).toHaveLength(1);
    expect(engine.runs[0]?.tag).toBe(engine.runs[1]?.tag);
  });

  it("rebuilds when forced", async () => {
    engine.images.add(expectedTag());

    await run({ command: [], root: dir, force: true }, deps);

    expect(engine.builds).toHaveLength(1);
  });

  it("returns the container's exit code", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    engine.exitCode = 3;

    await expect(run({ command: ["false"], root: dir }, deps)).resolves.toBe(3);
  });

  it("prints the Dockerfile on a dry run without touching the engine", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    await expect(run({ command: [], root: dir, dryRun: true }, deps)).resolves.toBe(0);

    const expected = convertToBuildSpec(loadMixinGraph(join(dir, "mc.yaml")), testContext()).toDockerfile();
    expect(write).toHaveBeenCalledWith(expected);
    expect(engine.existsCalls).toEqual([]);
    expect(engine.builds).toEqual([]);
    expect(engine.runs).toEqual([]);
  });

  it("prints the Dockerfile on a quiet dry run", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    enableQuietMode();

    await run({ command: [], root: dir, dryRun: true }, deps);

    const expected = convertToBuildSpec(loadMixinGraph(join(dir, "mc.yaml")), testContext()).toDockerfile();
    expect(write).toHaveBeenCalledWith(expected);
  });

  it("looks up named toolchains", async () => {
    writeTree(dir, { ".mc/arm/arm.yaml": "---\nbase: debian:bookworm\n---\n" });

    await run({ machine: "arm", command: [], root: dir }, deps);

    expect(engine.builds[0]?.dockerfile.startsWith("FROM debian:bookworm\n")).toBe(true);
  });

  it("validates command-line parameters before the lookup", async () => {
    await expect(run({ machine: "missing", command: [], root: dir, publish: ["bad"] }, deps)).rejects.toThrow(
      ValidationError
    );
  });

  it("fails when no toolchain exists", async () => {
    await expect(run({ machine: "missing", command: [], root: dir }, deps)).rejects.toThrow(ToolchainNotFoundError);
  });
});
