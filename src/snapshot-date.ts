// src/snapshot-date.ts
import { InvalidSnapshotNameError } from "./errors.js";

// YYYY-MM-DD; sorting these strings sorts chronologically.
export type SnapshotDate = string;

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function utcMillis(year: number, month: number, day: number): number {
  const d = new Date(0);
  // setUTCFullYear keeps years 0000-0099 literal, Date.UTC would not
  d.setUTCFullYear(year, month - 1, day);
  return d.getTime();
}

export function isSnapshotDate(name: string): boolean {
  const m = DATE_RE.exec(name);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  const d = new Date(utcMillis(year, month, day));
  return d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export function parseSnapshotDate(name: string, dir?: string): SnapshotDate {
  if (!isSnapshotDate(name)) {
    throw new InvalidSnapshotNameError(name, dir);
  }
  return name;
}

/** Whole days since 1970-01-01; negative before the epoch. */
export function dayOrdinal(date: SnapshotDate): number {
  const m = DATE_RE.exec(date);
  if (!m) throw new InvalidSnapshotNameError(date);
  const ms = utcMillis(Number(m[1]), Number(m[2]), Number(m[3]));
  return Math.round(ms / MS_PER_DAY);
}

export function compareSnapshotDates(a: SnapshotDate, b: SnapshotDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
