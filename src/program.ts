/**
 * Commander program for `mc`.
 *
 * Everything after the machine name belongs to the container command, so
 * `mc arm make check --keep-going` runs `make check --keep-going`.
 */

import { Command } from "commander";

import type { RunOptions } from "./commands/run.js";
import { VERSION } from "./constants.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";

interface CliOptions {
  dryRun?: boolean;
  force?: boolean;
  volume: string[];
  publish: string[];
  env: string[];
  debug?: boolean;
  quiet?: boolean;
}

/** Invoked with the parsed options; resolves with the process exit code. */
export type RunAction = (options: RunOptions) => Promise<number>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(action: RunAction): Command {
  const program = new Command();

  program
    .name("mc")
    .description("Run commands in a container synthesized from a mixin toolchain")
    .version(VERSION)
    .argument("[machine]", "Toolchain name (mc.yaml or .mc/mc.yaml when omitted)")
    .argument("[cmd...]", "Command executed in the container")
    .option("-d, --dry-run", "Print the Dockerfile and exit")
    .option("-F, --force", "Rebuild the image even if it exists")
    .option("-v, --volume <spec>", "Bind mount host_path:machine_path[:opts] (repeatable)", collect, [])
    .option("-p, --publish <spec>", "Publish [host_ip:]host_port:machine_port (repeatable)", collect, [])
    .option("-e, --env <KEY=VALUE>", "Set an environment variable in the container (repeatable)", collect, [])
    .option("--debug", "Show debug output")
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .passThroughOptions()
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.quiet) {
        enableQuietMode();
      } else if (opts.debug) {
        setLogLevel(LogLevel.DEBUG);
      }
    })
    .action(async (machine: string | undefined, cmd: string[], options: CliOptions) => {
      process.exitCode = await action({
        machine,
        command: cmd,
        dryRun: options.dryRun,
        force: options.force,
        publish: options.publish,
        volume: options.volume,
        env: options.env,
      });
    });

  return program;
}
