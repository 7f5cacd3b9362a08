import { main } from "../cli-program.js";
import { PreconditionError } from "../errors.js";
import type { MirrorOptions } from "../orchestrator.js";

describe("snapshot-mirror CLI", () => {
  let stderr: string[];
  let stdout: string[];

  beforeEach(() => {
    stderr = [];
    stdout = [];
    jest.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
    jest.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    jest.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const argv = (...args: string[]) => ["node", "snapshot-mirror", ...args];

  function fakeRun() {
    return jest.fn(async (_opts: MirrorOptions): Promise<string[]> => []);
  }

  it("prints usage and fails with a missing argument", async () => {
    const run = fakeRun();
    expect(await main(argv("/mnt/src"), { run })).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(stderr.join("")).toContain(
      "Usage: snapshot-mirror [options] <source-dir> <dest-dir>",
    );
  });

  it("fails with too many arguments", async () => {
    const run = fakeRun();
    expect(await main(argv("/a", "/b", "/c"), { run })).toBe(1);
    expect(run).not.toHaveBeenCalled();
  });

  it("passes the directories and flags to the mirror run", async () => {
    const run = fakeRun();
    expect(await main(argv("--dry-run", "/mnt/src", "/mnt/dst"), { run })).toBe(0);
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toMatchObject({
      source: "/mnt/src",
      destination: "/mnt/dst",
      dryRun: true,
      single: false,
    });
  });

  it("accepts --single", async () => {
    const run = fakeRun();
    await main(argv("/mnt/src", "/mnt/dst", "--single"), { run });
    expect(run.mock.calls[0][0]).toMatchObject({ dryRun: false, single: true });
  });

  it("rejects an unknown log level", async () => {
    const run = fakeRun();
    expect(
      await main(argv("--log-level", "loud", "/mnt/src", "/mnt/dst"), { run }),
    ).toBe(1);
    expect(run).not.toHaveBeenCalled();
  });

  it("exits non-zero with a diagnostic when the run fails", async () => {
    const run = jest.fn(async (_opts: MirrorOptions): Promise<string[]> => {
      throw new PreconditionError("no base snapshot available to start from", {
        target: "2024-01-10",
      });
    });
    expect(await main(argv("/mnt/src", "/mnt/dst"), { run })).toBe(1);
    expect(stderr).toEqual([
      "snapshot-mirror: PreconditionError: no base snapshot available to start from (target=2024-01-10)",
    ]);
  });
});
