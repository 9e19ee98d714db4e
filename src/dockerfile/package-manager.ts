/**
 * Package manager dialects.
 *
 * Each supported distro family is one entry of a closed union with a table of
 * command strings. Adding a distro is a table change, not new code.
 */

import { UnknownBaseError } from "../errors.js";
import { Instruction, type BuildInstruction } from "./instruction.js";

export type PackageManager = "dnf" | "zypper" | "pacman" | "apt" | "apk";

/** Command table for a single package manager. */
export interface PackageManagerProfile {
  readonly name: PackageManager;
  /** Non-interactive install prefix, packages are appended space-separated */
  readonly installPrefix: string;
  /** Full system update */
  readonly upgrade: string;
  /** Build args set before the locale packages are installed */
  readonly buildArgs: readonly (readonly [string, string])[];
  /** Packages providing en_US.UTF-8 (empty where UTF-8 is already the default) */
  readonly localePackages: readonly string[];
  /** Commands run after the locale packages are installed */
  readonly localeCommands: readonly string[];
  /** Installed with the sudo bootstrap; user provisioning and the entrypoint need them */
  readonly bootstrapPackages: readonly string[];
}

export const PACKAGE_MANAGERS: Readonly<Record<PackageManager, PackageManagerProfile>> = {
  dnf: {
    name: "dnf",
    installPrefix: "dnf install -y",
    upgrade: "dnf upgrade -y",
    buildArgs: [],
    localePackages: ["glibc-locale-source"],
    localeCommands: ["localedef --force --inputfile=en_US --charmap=UTF-8 en_US.UTF-8"],
    bootstrapPackages: ["sudo"],
  },
  zypper: {
    name: "zypper",
    installPrefix: "zypper install -y",
    upgrade: "zypper update -y",
    buildArgs: [],
    localePackages: ["glibc-locale", "glibc-i18ndata"],
    localeCommands: [],
    bootstrapPackages: ["sudo"],
  },
  pacman: {
    name: "pacman",
    installPrefix: "pacman -S --noconfirm",
    upgrade: "pacman -Syu --noconfirm",
    buildArgs: [],
    localePackages: [],
    localeCommands: [],
    bootstrapPackages: ["sudo"],
  },
  apt: {
    name: "apt",
    installPrefix: "apt install -y",
    upgrade: "apt update && apt upgrade -y",
    buildArgs: [["DEBIAN_FRONTEND", "noninteractive"]],
    localePackages: ["locales"],
    localeCommands: ["echo 'en_US.UTF-8 UTF-8' >> /etc/locale.gen", "locale-gen"],
    bootstrapPackages: ["sudo"],
  },
  apk: {
    name: "apk",
    installPrefix: "apk add",
    upgrade: "apk update",
    buildArgs: [],
    localePackages: [],
    localeCommands: [],
    // busybox has no groupadd/useradd and no bash
    bootstrapPackages: ["sudo", "shadow", "bash"],
  },
};

/** Distro token (image name before the first ':', lower-cased) to dialect. */
const DISTRO_PACKAGE_MANAGERS = new Map<string, PackageManager>([
  ["fedora", "dnf"],
  ["debian", "apt"],
  ["ubuntu", "apt"],
  ["opensuse/leap", "zypper"],
  ["opensuse/tumbleweed", "zypper"],
  ["opensuse-leap", "zypper"],
  ["opensuse-tumbleweed", "zypper"],
  ["archlinux", "pacman"],
  ["alpine", "apk"],
]);

/**
 * Resolve the package manager for a base image reference.
 *
 * @throws UnknownBaseError carrying the raw reference when no distro matches.
 */
export function resolvePackageManager(base: string): PackageManagerProfile {
  const colon = base.indexOf(":");
  const distro = (colon < 0 ? base : base.slice(0, colon)).toLowerCase();
  const manager = DISTRO_PACKAGE_MANAGERS.get(distro);
  if (manager === undefined) {
    throw new UnknownBaseError(base);
  }
  return PACKAGE_MANAGERS[manager];
}

export function installCommand(profile: PackageManagerProfile, packages: readonly string[]): BuildInstruction {
  return Instruction.run(`${profile.installPrefix} ${packages.join(" ")}`);
}

/** Full system update, preceded by its comment. */
export function upgradeInstructions(profile: PackageManagerProfile): BuildInstruction[] {
  return [Instruction.comment("Update outdated default dependencies"), Instruction.run(profile.upgrade)];
}

/** UTF-8 locale setup followed by the passwordless sudo bootstrap. */
export function bootstrapInstructions(profile: PackageManagerProfile): BuildInstruction[] {
  const result: BuildInstruction[] = [
    Instruction.comment("Ensure UTF-8 Support"),
    Instruction.env("LANG", "en_US.UTF-8"),
    Instruction.env("LANGUAGE", "en_US:en"),
    Instruction.env("LC_ALL", "en_US.UTF-8"),
  ];

  for (const [key, value] of profile.buildArgs) {
    result.push(Instruction.arg(key, value));
  }
  if (profile.localePackages.length > 0) {
    result.push(installCommand(profile, profile.localePackages));
  }
  for (const command of profile.localeCommands) {
    result.push(Instruction.run(command));
  }

  result.push(
    Instruction.comment("Installing sudo and allow sudo for anyone"),
    installCommand(profile, profile.bootstrapPackages),
    Instruction.run("echo 'ALL ALL = (ALL) NOPASSWD: ALL' >> /etc/sudoers")
  );
  return result;
}
