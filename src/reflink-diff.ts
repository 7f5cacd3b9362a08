// src/reflink-diff.ts
//
// Replays likely moves between two source snapshots as reflink copies in the
// destination, before rsync runs. rsync alone would rewrite a moved file from
// scratch and lose the sharing with the base; a reflinked copy keeps it, and
// rsync then fixes up whatever the heuristic got wrong.
import { lstat } from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import { makeParentDir, reflinkCopy } from "./commands.js";
import type { ToolConfig } from "./config.js";
import { ExternalToolError, errorMessage } from "./errors.js";
import type { OperationExecutor } from "./executor.js";
import { NullLogger, type Logger } from "./logger.js";

export type DiffTrees = {
  sourceBase: string;
  sourceTarget: string;
  destinationBase: string;
  destinationTarget: string;
};

export type DiffMode = "simulate" | "apply";

export type PlannedCopy = {
  from: string; // relative to the base tree
  to: string; // relative to the target tree
};

export type DiffResult = {
  planned: PlannedCopy[];
  copied: PlannedCopy[];
  // the destination layout did not allow the copy; rsync fixes these up
  skipped: Array<PlannedCopy & { reason: string }>;
  failed: Array<PlannedCopy & { error: string }>;
};

export interface StructuralDiffTool {
  diff(trees: DiffTrees, mode: DiffMode): Promise<DiffResult>;
}

/** Relative paths of regular files, grouped by size and mtime. */
export type TreeScan = {
  root: string;
  entries: Map<string, string[]>;
};

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// mtimeMs keeps the sub-millisecond fraction but not full nanoseconds
function fileKey(size: number, mtimeMs: number): string {
  return `${size}:${mtimeMs}`;
}

async function lstatOrNull(p: string): Promise<Stats | null> {
  try {
    return await lstat(p);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Why `to` cannot be written inside `root`, or null if it can: an ancestor
 * that is not a directory, or a directory sitting where the file should go.
 */
export async function copyConflict(
  root: string,
  to: string,
): Promise<string | null> {
  const parts = to.split("/");
  let current = root;
  for (const part of parts.slice(0, -1)) {
    current = path.join(current, part);
    const st = await lstatOrNull(current);
    if (!st) return null;
    if (!st.isDirectory()) {
      return `${path.relative(root, current)} is not a directory`;
    }
  }
  const st = await lstatOrNull(path.join(root, to));
  return st?.isDirectory() ? `${to} is a directory` : null;
}

function walkTree(
  root: string,
  settings: walk.Options,
): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(root, settings, (err, entries) =>
      err ? reject(err) : resolve(entries),
    );
  });
}

export async function scanTree(root: string): Promise<TreeScan> {
  const abs = path.resolve(root);
  const rootDev = (await lstat(abs)).dev;
  const onRootDevice = (e: walk.Entry) => e.stats?.dev === rootDev;

  const found = await walkTree(abs, {
    stats: true,
    followSymbolicLinks: false,
    // stay on the snapshot's own filesystem
    deepFilter: (e) => onRootDevice(e),
    entryFilter: (e) => onRootDevice(e) && !!e.stats?.isFile(),
  });

  const entries = new Map<string, string[]>();
  for (const e of found) {
    if (!e.stats) continue;
    const key = fileKey(e.stats.size, e.stats.mtimeMs);
    const rel = path.relative(abs, e.path);
    const list = entries.get(key);
    if (list) list.push(rel);
    else entries.set(key, [rel]);
  }
  for (const list of entries.values()) list.sort();
  return { root: abs, entries };
}

/**
 * A target file with the same size and mtime as some base file, but at a path
 * where the base has no such file, is assumed to have been moved or copied.
 * Contents are not compared; this is only a heuristic.
 */
export function planCopies(base: TreeScan, target: TreeScan): PlannedCopy[] {
  const copies: PlannedCopy[] = [];
  for (const [key, paths] of target.entries) {
    const basePaths = base.entries.get(key);
    if (!basePaths) continue;
    for (const rel of paths) {
      if (basePaths.includes(rel)) continue;
      copies.push({ from: basePaths[0], to: rel });
    }
  }
  // deterministic regardless of map order
  return copies.sort(
    (a, b) => compareStrings(a.from, b.from) || compareStrings(a.to, b.to),
  );
}

type ReflinkDiffOptions = {
  executor: OperationExecutor;
  tools: ToolConfig;
  logger?: Logger;
};

export class ReflinkDiffTool implements StructuralDiffTool {
  readonly executor: OperationExecutor;
  private readonly tools: ToolConfig;
  private readonly logger: Logger;

  constructor({ executor, tools, logger }: ReflinkDiffOptions) {
    this.executor = executor;
    this.tools = tools;
    this.logger = logger ?? new NullLogger();
  }

  async diff(trees: DiffTrees, mode: DiffMode): Promise<DiffResult> {
    let planned: PlannedCopy[];
    try {
      const [base, target] = await Promise.all([
        scanTree(trees.sourceBase),
        scanTree(trees.sourceTarget),
      ]);
      planned = planCopies(base, target);
    } catch (err) {
      throw new ExternalToolError(
        `diff failed to scan source trees: ${errorMessage(err)}`,
        "diff",
        null,
        { paths: [trees.sourceBase, trees.sourceTarget] },
      );
    }
    this.logger.info(`${planned.length} likely moves to replay`, { mode });
    const result: DiffResult = { planned, copied: [], skipped: [], failed: [] };

    if (mode === "simulate") {
      for (const c of planned) {
        this.logger.info(`${c.from} -> ${c.to}`);
      }
      return result;
    }

    // Every copy is a guess; a copy that cannot be made is left to rsync
    // rather than aborting the pass.
    const madeDirs = new Set<string>();
    for (const c of planned) {
      const reason = await copyConflict(trees.destinationTarget, c.to);
      if (reason) {
        this.logger.debug(`skipping ${c.from} -> ${c.to}: ${reason}`);
        result.skipped.push({ ...c, reason });
        continue;
      }
      const dst = path.join(trees.destinationTarget, c.to);
      const parent = path.dirname(dst);
      try {
        if (parent !== trees.destinationTarget && !madeDirs.has(parent)) {
          await this.executor.execute(makeParentDir(this.tools, dst));
          madeDirs.add(parent);
        }
        await this.executor.execute(
          reflinkCopy(this.tools, path.join(trees.destinationBase, c.from), dst),
        );
        result.copied.push(c);
      } catch (err) {
        if (!(err instanceof ExternalToolError)) throw err;
        this.logger.warn("reflink copy failed, leaving it to rsync", {
          from: c.from,
          to: c.to,
          error: err.message,
        });
        result.failed.push({ ...c, error: err.message });
      }
    }
    if (result.skipped.length || result.failed.length) {
      this.logger.info(
        `replayed ${result.copied.length} of ${planned.length} moves`,
        { skipped: result.skipped.length, failed: result.failed.length },
      );
    }
    return result;
  }
}
