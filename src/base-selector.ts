// src/base-selector.ts
import { dateDistance } from "./distance.js";
import { PreconditionError } from "./errors.js";
import { compareSnapshotDates, type SnapshotDate } from "./snapshot-date.js";

export type BaseChoice = {
  base: SnapshotDate;
  distance: number;
};

// ascending distance, then ascending date
export function compareChoices(a: BaseChoice, b: BaseChoice): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  return compareSnapshotDates(a.base, b.base);
}

export function selectBase(
  target: SnapshotDate,
  candidates: Iterable<SnapshotDate>,
): BaseChoice {
  let best: BaseChoice | undefined;
  for (const base of candidates) {
    const choice = { base, distance: dateDistance(target, base) };
    if (!best || compareChoices(choice, best) < 0) {
      best = choice;
    }
  }
  if (!best) {
    throw new PreconditionError("no base snapshot available to start from", {
      target,
    });
  }
  return best;
}
