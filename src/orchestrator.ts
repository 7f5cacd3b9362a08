// src/orchestrator.ts
import path from "node:path";
import { selectBase } from "./base-selector.js";
import {
  barrier,
  cloneSnapshot,
  markReadonly,
  transferContents,
} from "./commands.js";
import { loadToolConfig, type ToolConfig } from "./config.js";
import {
  DryRunExecutor,
  ProcessExecutor,
  type OperationExecutor,
} from "./executor.js";
import { NullLogger, scopedLogger, type Logger } from "./logger.js";
import { ReflinkDiffTool, type StructuralDiffTool } from "./reflink-diff.js";
import type { SnapshotDate } from "./snapshot-date.js";
import {
  DirectorySnapshotRepository,
  latestDate,
  missingDates,
  type SnapshotRepository,
} from "./snapshot-set.js";

export type MirrorContext = {
  source: string;
  destination: string;
  dryRun: boolean;
  repository: SnapshotRepository;
  executor: OperationExecutor;
  diffTool: StructuralDiffTool;
  tools: ToolConfig;
  logger: Logger;
};

export type MirrorOptions = {
  source: string;
  destination: string;
  // report every mutation instead of running it; stops after one pass
  dryRun?: boolean;
  // stop after one synced snapshot even if more are missing
  single?: boolean;
  logger?: Logger;
  repository?: SnapshotRepository;
  executor?: OperationExecutor;
  diffTool?: StructuralDiffTool;
  tools?: ToolConfig;
};

export function createMirrorContext(opts: MirrorOptions): MirrorContext {
  const dryRun = !!opts.dryRun;
  const logger = opts.logger ?? new NullLogger();
  const tools = opts.tools ?? loadToolConfig();
  const executor =
    opts.executor ??
    (dryRun
      ? new DryRunExecutor({ logger: scopedLogger(logger, "exec") })
      : new ProcessExecutor({ logger: scopedLogger(logger, "exec") }));
  return {
    source: opts.source,
    destination: opts.destination,
    dryRun,
    repository: opts.repository ?? new DirectorySnapshotRepository(),
    executor,
    diffTool:
      opts.diffTool ??
      new ReflinkDiffTool({
        executor,
        tools,
        logger: scopedLogger(logger, "diff"),
      }),
    tools,
    logger: scopedLogger(logger, "orchestrator"),
  };
}

/**
 * Sync the latest snapshot that the destination is missing, cloned from the
 * closest destination snapshot. Returns the date synced, or null when the
 * destination already has everything.
 *
 * The latest missing date always goes first, even if an older one would share
 * more with what is already there: data mostly grows, so it is better to
 * fragment the early snapshots than the recent ones, and a recent snapshot
 * makes a good base for rebuilding the past backwards.
 */
export async function syncOne(ctx: MirrorContext): Promise<SnapshotDate | null> {
  const { source, destination, repository, executor, tools, logger } = ctx;

  // listed afresh on every pass: earlier passes changed the destination
  const srcDates = await repository.listDates(source);
  const dstDates = await repository.listDates(destination);
  const missing = missingDates(srcDates, dstDates);
  const target = latestDate(missing);
  if (target === undefined) {
    return null;
  }

  const { base, distance } = selectBase(target, dstDates);
  logger.info(`syncing ${target}, using ${base} as base`, {
    distance,
    missing: missing.length,
  });

  const dstBase = path.join(destination, base);
  const dstTarget = path.join(destination, target);

  await executor.execute(cloneSnapshot(tools, dstBase, dstTarget));

  logger.info("waiting for sync of snapshot");
  await executor.execute(barrier(tools, dstTarget));

  await ctx.diffTool.diff(
    {
      sourceBase: path.join(source, base),
      sourceTarget: path.join(source, target),
      destinationBase: dstBase,
      destinationTarget: dstTarget,
    },
    ctx.dryRun ? "simulate" : "apply",
  );

  await executor.execute(
    transferContents(tools, path.join(source, target), dstTarget),
  );

  await executor.execute(markReadonly(tools, dstTarget));
  await executor.execute(barrier(tools, dstTarget));

  logger.info(`synced ${target}`);
  return target;
}

/**
 * Sync missing snapshots one at a time until the destination is complete.
 * Nothing is caught here: a failing step aborts the run and leaves the
 * snapshot it was working on as it is.
 */
export async function runMirror(opts: MirrorOptions): Promise<SnapshotDate[]> {
  const ctx = createMirrorContext(opts);
  const synced: SnapshotDate[] = [];
  while (true) {
    const date = await syncOne(ctx);
    if (date === null) {
      ctx.logger.info("destination is up to date");
      break;
    }
    synced.push(date);

    if (opts.single) {
      ctx.logger.info("stopping after one transfer because of --single");
      break;
    }
    // in a dry run nothing changes, so the same date would come up forever
    if (ctx.dryRun) {
      ctx.logger.info(
        "stopping now to avoid an endless loop because of --dry-run",
      );
      break;
    }
  }
  return synced;
}
