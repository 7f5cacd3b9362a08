// src/cli-program.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command, CommanderError, Option } from "commander";
import { describeError } from "./errors.js";
import { ConsoleLogger, LOG_LEVELS, parseLogLevel } from "./logger.js";
import { runMirror, type MirrorOptions } from "./orchestrator.js";
import type { SnapshotDate } from "./snapshot-date.js";

export const CLI_NAME = "snapshot-mirror";

const DESCRIPTION = `Mirror read-only btrfs snapshots between two filesystems.

Replicates subvolumes named YYYY-MM-DD from <source-dir> to <dest-dir> as
read-only subvolumes, preserving as much sharing between them as possible
without relying on btrfs internals, so the two filesystems stay isolated.

Each missing snapshot is cloned from the destination snapshot with the
nearest date (dates in the future are preferred), then filled in with rsync
using flags that limit fragmentation and maximize sharing. The destination
must already contain at least one snapshot.

This command might need to run as superuser.`;

type CliOptions = {
  dryRun: boolean;
  single: boolean;
  logLevel: string;
};

export type CliDeps = {
  run?: (opts: MirrorOptions) => Promise<SnapshotDate[]>;
};

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw) {
      return String(raw.version);
    }
  } catch {
    // not shipped alongside the build
  }
  return "0.0.0";
}

export function buildProgram(deps: CliDeps = {}): Command {
  const run = deps.run ?? runMirror;
  return new Command()
    .name(CLI_NAME)
    .description(DESCRIPTION)
    .version(packageVersion())
    .argument("<source-dir>", "directory with YYYY-MM-DD snapshots to copy")
    .argument("<dest-dir>", "directory to mirror the snapshots into")
    .option(
      "--dry-run",
      "print the commands that would be executed, but do not execute them",
      false,
    )
    .option(
      "--single",
      "stop after syncing one snapshot, even if more are missing",
      false,
    )
    .addOption(
      new Option("--log-level <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .default("info"),
    )
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .action(async (source: string, destination: string, opts: CliOptions) => {
      const logger = new ConsoleLogger(parseLogLevel(opts.logLevel));
      await run({
        source,
        destination,
        dryRun: opts.dryRun,
        single: opts.single,
        logger: logger.child("mirror"),
      });
    });
}

/** Parses argv (node-style, including the executable and script) and runs. */
export async function main(
  argv: string[] = process.argv,
  deps: CliDeps = {},
): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // usage errors were already printed by commander, help and version exit 0
    if (err instanceof CommanderError) return err.exitCode;
    console.error(`${CLI_NAME}: ${describeError(err)}`);
    return 1;
  }
}
