// src/distance.ts
import { dayOrdinal, type SnapshotDate } from "./snapshot-date.js";

/**
 * Days from `target` to `candidate`, doubled when the candidate lies in the
 * past. Snapshots mostly grow over time, so files missing from the target are
 * more likely to already exist in a later snapshot than in an earlier one,
 * and this biases base selection towards building backwards.
 */
export function dateDistance(
  target: SnapshotDate,
  candidate: SnapshotDate,
): number {
  const diff = dayOrdinal(candidate) - dayOrdinal(target);
  return diff < 0 ? -2 * diff : diff;
}
