import fsp from "node:fs/promises";
import path from "node:path";
import { InvalidSnapshotNameError } from "../errors.js";
import { DirectorySnapshotRepository } from "../snapshot-set.js";
import { mkTmp } from "./util.js";

describe("DirectorySnapshotRepository", () => {
  let tmp: string;
  const repo = new DirectorySnapshotRepository();

  beforeEach(async () => {
    tmp = await mkTmp("snapshot-set-");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  it("lists the dates of the snapshot directories", async () => {
    await fsp.mkdir(path.join(tmp, "2024-01-05"));
    await fsp.mkdir(path.join(tmp, "2024-01-01"));
    const dates = await repo.listDates(tmp);
    expect(Array.from(dates).sort()).toEqual(["2024-01-01", "2024-01-05"]);
  });

  it("sees changes made between calls", async () => {
    await fsp.mkdir(path.join(tmp, "2024-01-01"));
    expect((await repo.listDates(tmp)).size).toBe(1);
    await fsp.mkdir(path.join(tmp, "2024-01-10"));
    expect(await repo.listDates(tmp)).toEqual(
      new Set(["2024-01-01", "2024-01-10"]),
    );
  });

  it("rejects a volume with a name that is not a date", async () => {
    await fsp.mkdir(path.join(tmp, "2024-01-01"));
    await fsp.mkdir(path.join(tmp, "scratch"));
    const err = await repo.listDates(tmp).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidSnapshotNameError);
    expect(err).toMatchObject({ snapshotName: "scratch", dir: tmp });
  });

  it("is empty for an empty volume", async () => {
    expect((await repo.listDates(tmp)).size).toBe(0);
  });
});
