/**
 * Identity of the invoking host user, mirrored into the image so files
 * written in the bind-mounted working directory keep their host ownership.
 */

import { userInfo } from "node:os";

import { execaSync } from "execa";

import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

export interface HostIdentity {
  readonly uid: number;
  readonly gid: number;
  readonly userName: string;
  readonly groupName: string;
}

function primaryGroupName(fallback: string): string {
  try {
    const name = execaSync("id", ["-gn"]).stdout.trim();
    return name || fallback;
  } catch (error) {
    // no `id` binary: use the user name, the usual per-user group
    log.debug(`id -gn failed, using group ${fallback}: ${error instanceof Error ? error.message : String(error)}`);
    return fallback;
  }
}

/**
 * Read uid, gid and names of the current process user.
 *
 * @throws ConfigError on platforms without POSIX ids (Windows).
 */
export function getHostIdentity(): HostIdentity {
  const info = userInfo();
  if (info.uid < 0 || info.gid < 0) {
    throw new ConfigError("Host user has no POSIX uid/gid; mini-cross needs a Linux or macOS host");
  }
  return {
    uid: info.uid,
    gid: info.gid,
    userName: info.username,
    groupName: primaryGroupName(info.username),
  };
}
