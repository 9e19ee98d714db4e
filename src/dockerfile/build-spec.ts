/**
 * Build specification: the instruction sequence plus the runtime parameters
 * forwarded to `docker run`.
 *
 * Only the instructions feed the canonical text and therefore the image tag.
 * Publishes, volumes and env vars can change between invocations without
 * forcing a rebuild.
 */

import { createHash } from "node:crypto";

import { IMAGE_TAG_PREFIX } from "../constants.js";
import type { Publish, Volume } from "../runtime-params.js";
import { formatInstruction, type BuildInstruction } from "./instruction.js";

export class BuildSpec {
  private readonly entries: BuildInstruction[] = [];
  /** Publish (-p) added to docker run */
  private readonly publishList: Publish[] = [];
  /** Volume (-v) added to docker run */
  private readonly volumeList: Volume[] = [];
  /** Environment (-e) added to docker run, in insertion order, duplicates kept */
  private readonly envList: [string, string][] = [];
  /** Set by hash(); the instruction list is frozen from then on */
  private hashed = false;

  private assertMutable(): void {
    if (this.hashed) {
      throw new Error("BuildSpec instructions cannot change after the spec was hashed");
    }
  }

  add(instruction: BuildInstruction): this {
    this.assertMutable();
    this.entries.push(instruction);
    return this;
  }

  addAll(instructions: Iterable<BuildInstruction>): this {
    this.assertMutable();
    for (const instruction of instructions) {
      this.entries.push(instruction);
    }
    return this;
  }

  addPublishes(publishes: Iterable<Publish>): this {
    this.publishList.push(...publishes);
    return this;
  }

  addVolumes(volumes: Iterable<Volume>): this {
    this.volumeList.push(...volumes);
    return this;
  }

  addEnv(key: string, value: string): this {
    this.envList.push([key, value]);
    return this;
  }

  get instructions(): readonly BuildInstruction[] {
    return this.entries;
  }

  get publishes(): readonly Publish[] {
    return this.publishList;
  }

  get volumes(): readonly Volume[] {
    return this.volumeList;
  }

  get env(): readonly (readonly [string, string])[] {
    return this.envList;
  }

  /**
   * Canonical Dockerfile text: one instruction per line, each LF-terminated,
   * with a blank line before every comment.
   */
  toDockerfile(): string {
    let text = "";
    for (const entry of this.entries) {
      if (entry.kind === "comment") {
        text += "\n";
      }
      text += `${formatInstruction(entry)}\n`;
    }
    return text;
  }

  /** Lower-case hex SHA-256 of the canonical text. */
  hash(): string {
    this.hashed = true;
    return createHash("sha256").update(this.toDockerfile(), "utf8").digest("hex");
  }

  /** Content-addressed image tag. */
  tag(): string {
    return `${IMAGE_TAG_PREFIX}-${this.hash()}`;
  }
}
