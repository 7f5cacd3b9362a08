// src/snapshot-set.ts
import { readdir } from "node:fs/promises";
import {
  compareSnapshotDates,
  parseSnapshotDate,
  type SnapshotDate,
} from "./snapshot-date.js";

/**
 * Read-only view of the snapshots present on a volume. Implementations must
 * not cache: the destination changes under every pass.
 */
export interface SnapshotRepository {
  listDates(volumeDir: string): Promise<Set<SnapshotDate>>;
}

export class DirectorySnapshotRepository implements SnapshotRepository {
  async listDates(volumeDir: string): Promise<Set<SnapshotDate>> {
    const names = await readdir(volumeDir);
    const dates = new Set<SnapshotDate>();
    for (const name of names) {
      dates.add(parseSnapshotDate(name, volumeDir));
    }
    return dates;
  }
}

export function sortDates(dates: Iterable<SnapshotDate>): SnapshotDate[] {
  return Array.from(dates).sort(compareSnapshotDates);
}

export function missingDates(
  source: ReadonlySet<SnapshotDate>,
  destination: ReadonlySet<SnapshotDate>,
): SnapshotDate[] {
  return sortDates(Array.from(source).filter((d) => !destination.has(d)));
}

export function latestDate(dates: Iterable<SnapshotDate>): SnapshotDate | undefined {
  let latest: SnapshotDate | undefined;
  for (const d of dates) {
    if (latest === undefined || compareSnapshotDates(d, latest) > 0) {
      latest = d;
    }
  }
  return latest;
}
