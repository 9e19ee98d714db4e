import { describe, expect, it } from "vitest";

import { BuildSpec } from "../../src/dockerfile/build-spec.js";
import { formatInstruction, Instruction } from "../../src/dockerfile/instruction.js";

function sampleSpec(): BuildSpec {
  return new BuildSpec().add(Instruction.from("alpine")).add(Instruction.comment("x")).add(Instruction.run("y"));
}

describe("formatInstruction", () => {
  it.each([
    [Instruction.from("fedora:39"), "FROM fedora:39"],
    [Instruction.comment("hello"), "# hello"],
    [Instruction.env("LANG", "C.UTF-8"), "ENV LANG=C.UTF-8"],
    [Instruction.arg("DEBIAN_FRONTEND", "noninteractive"), "ARG DEBIAN_FRONTEND=noninteractive"],
    [Instruction.run("make"), "RUN make"],
    [Instruction.user(1000, 100), "USER 1000:100"],
    [Instruction.user(0), "USER 0"],
    [Instruction.copy("ctx/sysroot", "/sysroot"), "COPY ctx/sysroot /sysroot"],
  ])("formats %o", (instruction, expected) => {
    expect(formatInstruction(instruction)).toBe(expected);
  });
});

describe("BuildSpec", () => {
  it("renders one line per instruction with a blank line before comments", () => {
    expect(sampleSpec().toDockerfile()).toBe("FROM alpine\n\n# x\nRUN y\n");
  });

  it("hashes the canonical text with SHA-256", () => {
    expect(sampleSpec().hash()).toBe("172c0b1d973129311057270b43639eb56f33e7bc17b101e9b3da722e5fa8a283");
  });

  it("prefixes the tag", () => {
    expect(sampleSpec().tag()).toBe("mini-cross-172c0b1d973129311057270b43639eb56f33e7bc17b101e9b3da722e5fa8a283");
  });

  it("excludes runtime parameters from the tag", () => {
    const withParams = sampleSpec()
      .addPublishes([{ hostPort: 8080, machinePort: 80 }])
      .addVolumes([{ hostPath: "/a", machinePath: "/b", options: [] }])
      .addEnv("A", "1");

    expect(withParams.tag()).toBe(sampleSpec().tag());
  });

  it("changes the tag when an instruction changes", () => {
    const other = new BuildSpec().add(Instruction.from("alpine")).add(Instruction.comment("x")).add(Instruction.run("z"));
    expect(other.tag()).not.toBe(sampleSpec().tag());
  });

  it("keeps env entries in insertion order with duplicates", () => {
    const spec = new BuildSpec().addEnv("A", "1").addEnv("B", "2").addEnv("A", "3");
    expect(spec.env).toEqual([
      ["A", "1"],
      ["B", "2"],
      ["A", "3"],
    ]);
  });

  it("rejects instruction changes after hashing", () => {
    const spec = sampleSpec();
    spec.tag();

    expect(() => spec.add(Instruction.run("z"))).toThrow("BuildSpec instructions cannot change after the spec was hashed");
    expect(() => spec.addEnv("A", "1")).not.toThrow();
  });

  it("renders an empty spec as empty text", () => {
    expect(new BuildSpec().toDockerfile()).toBe("");
  });
});
