import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import type { ConversionContext } from "../../src/dockerfile/index.js";
import type { HostIdentity } from "../../src/host-identity.js";

export const TEST_IDENTITY: HostIdentity = {
  uid: 1000,
  gid: 1000,
  userName: "dev",
  groupName: "dev",
};

/** Context with a fixed identity and a canned directory listing. */
export function testContext(contextDirs: string[] = []): ConversionContext {
  return {
    identity: TEST_IDENTITY,
    listContextDirs: () => contextDirs,
  };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "mini-cross-test-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write files relative to root, creating parent directories. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const path = join(root, name);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}
