// src/commands.ts
import path from "node:path";
import type { ToolConfig } from "./config.js";
import type { OperationStep } from "./errors.js";

export type Operation = {
  step: OperationStep;
  command: string;
  args: string[];
  // the snapshot paths the operation touches, for diagnostics
  paths: string[];
};

export function argsJoin(args: string[]): string {
  return args.map((x) => (x.includes(" ") ? `'${x}'` : x)).join(" ");
}

export function commandLine(op: Operation): string {
  return `${op.command} ${argsJoin(op.args)}`;
}

export function ensureTrailingSlash(root: string): string {
  return root.endsWith("/") ? root : root + "/";
}

export function cloneSnapshot(
  tools: ToolConfig,
  existing: string,
  created: string,
): Operation {
  return {
    step: "clone",
    command: tools.btrfs,
    args: ["subvolume", "snapshot", existing, created],
    paths: [existing, created],
  };
}

// `btrfs subvolume sync` tends to spin forever in an ioctl loop; a
// filesystem-wide sync does not.
export function barrier(tools: ToolConfig, target: string): Operation {
  return {
    step: "barrier",
    command: tools.btrfs,
    args: ["filesystem", "sync", target],
    paths: [target],
  };
}

export function markReadonly(tools: ToolConfig, target: string): Operation {
  return {
    step: "mark-readonly",
    command: tools.btrfs,
    args: ["property", "set", "-t", "subvol", target, "ro", "true"],
    paths: [target],
  };
}

/**
 * In-place updates, fuzzy basis files and delayed deletes all keep rsync
 * from writing new extents where the cloned base already has the data.
 */
export function transferContents(
  tools: ToolConfig,
  from: string,
  to: string,
): Operation {
  return {
    step: "transfer",
    command: tools.rsync,
    args: [
      "-a",
      "--delete-delay",
      "--inplace",
      "--preallocate",
      "--no-whole-file",
      "--fuzzy",
      "--info=copy,del,name1,progress2,stats2",
      ensureTrailingSlash(from),
      to,
    ],
    paths: [from, to],
  };
}

export function makeParentDir(tools: ToolConfig, file: string): Operation {
  const dir = path.dirname(file);
  return {
    step: "diff",
    command: tools.mkdir,
    args: ["-p", dir],
    paths: [dir],
  };
}

export function reflinkCopy(
  tools: ToolConfig,
  from: string,
  to: string,
): Operation {
  return {
    step: "diff",
    command: tools.cp,
    args: [
      "--reflink=always",
      "--no-dereference",
      // never copy into an existing directory named like the target
      "--no-target-directory",
      "--preserve=timestamps,mode",
      "--",
      from,
      to,
    ],
    paths: [from, to],
  };
}
