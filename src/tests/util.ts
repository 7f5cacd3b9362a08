import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Operation } from "../commands.js";
import { ExternalToolError, type OperationStep } from "../errors.js";
import type { OperationExecutor } from "../executor.js";
import { StructuredLogger, type LogEntry } from "../logger.js";
import type {
  DiffMode,
  DiffResult,
  DiffTrees,
  StructuralDiffTool,
} from "../reflink-diff.js";
import type { SnapshotDate } from "../snapshot-date.js";
import type { SnapshotRepository } from "../snapshot-set.js";

export const SRC = "/vol/src";
export const DST = "/vol/dst";

/** Snapshot sets keyed by volume dir; lists a fresh copy every time. */
export class MemoryRepository implements SnapshotRepository {
  readonly volumes = new Map<string, Set<SnapshotDate>>();
  listCalls = 0;

  constructor(init: Record<string, SnapshotDate[]> = {}) {
    for (const [dir, dates] of Object.entries(init)) {
      this.volumes.set(dir, new Set(dates));
    }
  }

  async listDates(volumeDir: string): Promise<Set<SnapshotDate>> {
    this.listCalls++;
    return new Set(this.volumes.get(volumeDir) ?? []);
  }

  add(volumeDir: string, date: SnapshotDate) {
    const set = this.volumes.get(volumeDir) ?? new Set<SnapshotDate>();
    set.add(date);
    this.volumes.set(volumeDir, set);
  }

  dates(volumeDir: string): SnapshotDate[] {
    return Array.from(this.volumes.get(volumeDir) ?? []).sort();
  }
}

/**
 * Records operations and makes clones visible in the repository, the way a
 * real `btrfs subvolume snapshot` would. Optionally fails at one step.
 */
export class FakeVolumeExecutor implements OperationExecutor {
  readonly operations: Operation[] = [];

  constructor(
    private readonly repo: MemoryRepository,
    private readonly failAt?: OperationStep,
  ) {}

  async execute(op: Operation): Promise<void> {
    this.operations.push(op);
    if (op.step === "clone") {
      const created = op.args[op.args.length - 1];
      this.repo.add(path.dirname(created), path.basename(created));
    }
    if (op.step === this.failAt) {
      throw new ExternalToolError(`${op.step} failed (exit code 1)`, op.step, 1, {
        paths: op.paths,
      });
    }
  }

  steps(): OperationStep[] {
    return this.operations.map((op) => op.step);
  }
}

export class RecordingDiffTool implements StructuralDiffTool {
  readonly calls: Array<{ trees: DiffTrees; mode: DiffMode }> = [];

  async diff(trees: DiffTrees, mode: DiffMode): Promise<DiffResult> {
    this.calls.push({ trees, mode });
    return { planned: [], copied: [], skipped: [], failed: [] };
  }
}

export function captureLogger() {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    minLevel: "debug",
    sink: (entry) => entries.push(entry),
    clock: () => 0,
  });
  return { logger, entries, messages: () => entries.map((e) => e.message) };
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFileAt(
  root: string,
  rel: string,
  content: string,
  mtime: Date,
): Promise<void> {
  const full = path.join(root, rel);
  await fsp.mkdir(path.dirname(full), { recursive: true });
  await fsp.writeFile(full, content);
  await fsp.utimes(full, mtime, mtime);
}
