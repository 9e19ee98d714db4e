/**
 * Runtime parameters forwarded to `docker run`.
 *
 * Publish (-p) and volume (-v) specs are parsed from their docker text form
 * and formatted back to it unchanged, so parse(format(x)) reproduces x.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 */

import { ValidationError } from "./errors.js";

/** Published port: `[host_ip:]host_port:machine_port`. */
export interface Publish {
  readonly hostIp?: string;
  readonly hostPort: number;
  readonly machinePort: number;
}

export const VOLUME_OPTIONS = ["ro", "readonly", "volume-nocopy"] as const;
export type VolumeOption = (typeof VOLUME_OPTIONS)[number];

/** Bind mount: `host_path:machine_path[:opt,...]`. */
export interface Volume {
  readonly hostPath: string;
  readonly machinePath: string;
  readonly options: readonly VolumeOption[];
}

const PUBLISH_FORMAT = "[<host_ip>:]<host_port>:<machine_port>";
const VOLUME_FORMAT = "<host_path>:<machine_path>[:<ro|readonly|volume-nocopy,..>]";

const MAX_PORT = 65_535;

function parsePort(raw: string, spec: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`Invalid port '${raw}' in publish '${spec}'. Expected ${PUBLISH_FORMAT}`);
  }
  const port = parseInt(raw, 10);
  if (port > MAX_PORT) {
    throw new ValidationError(`Port ${port} out of range in publish '${spec}'`);
  }
  return port;
}

/**
 * Parse a publish spec.
 *
 * @throws ValidationError on anything other than two or three `:`-separated parts.
 */
export function parsePublish(spec: string): Publish {
  const parts = spec.split(":");
  if (parts.length !== 2 && parts.length !== 3) {
    throw new ValidationError(`Invalid publish format '${spec}'. Expected ${PUBLISH_FORMAT}`);
  }

  const hostPort = parsePort(parts[parts.length - 2] ?? "", spec);
  const machinePort = parsePort(parts[parts.length - 1] ?? "", spec);
  if (parts.length === 2) {
    return { hostPort, machinePort };
  }
  return { hostIp: parts[0], hostPort, machinePort };
}

export function formatPublish(publish: Publish): string {
  const prefix = publish.hostIp !== undefined ? `${publish.hostIp}:` : "";
  return `${prefix}${publish.hostPort}:${publish.machinePort}`;
}

function isVolumeOption(value: string): value is VolumeOption {
  return VOLUME_OPTIONS.some((option) => option === value);
}

/**
 * Parse a volume spec.
 *
 * @throws ValidationError on a wrong part count or an unknown option.
 */
export function parseVolume(spec: string): Volume {
  const parts = spec.split(":");
  const [hostPath, machinePath, rawOptions] = parts;
  if ((parts.length !== 2 && parts.length !== 3) || hostPath === undefined || machinePath === undefined) {
    throw new ValidationError(`Invalid volume format '${spec}'. Expected ${VOLUME_FORMAT}`);
  }

  const options: VolumeOption[] = [];
  if (rawOptions !== undefined) {
    for (const option of rawOptions.split(",")) {
      if (!isVolumeOption(option)) {
        throw new ValidationError(`Invalid volume option '${option}' in '${spec}'. Expected ${VOLUME_FORMAT}`);
      }
      options.push(option);
    }
  }

  return { hostPath, machinePath, options };
}

export function formatVolume(volume: Volume): string {
  const base = `${volume.hostPath}:${volume.machinePath}`;
  return volume.options.length > 0 ? `${base}:${volume.options.join(",")}` : base;
}
