// src/errors.ts

export type OperationStep =
  | "clone"
  | "barrier"
  | "diff"
  | "transfer"
  | "mark-readonly";

export class MirrorError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MirrorError";
  }
}

/**
 * The destination has no snapshot to clone from. A run cannot recover from
 * this; the first snapshot has to be seeded out of band.
 */
export class PreconditionError extends MirrorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "PreconditionError";
  }
}

export class InvalidSnapshotNameError extends MirrorError {
  constructor(
    public readonly snapshotName: string,
    public readonly dir?: string,
  ) {
    super(
      `invalid snapshot name '${snapshotName}'${dir ? ` in ${dir}` : ""} (expected YYYY-MM-DD)`,
      dir ? { name: snapshotName, dir } : { name: snapshotName },
    );
    this.name = "InvalidSnapshotNameError";
  }
}

export class ExternalToolError extends MirrorError {
  constructor(
    message: string,
    public readonly step: OperationStep,
    public readonly code: number | null,
    context?: Record<string, unknown>,
  ) {
    super(message, { step, ...context, code });
    this.name = "ExternalToolError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// One line for the terminal: name, message and the structured context.
export function describeError(err: unknown): string {
  if (!(err instanceof MirrorError)) {
    return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  }
  const ctx = err.context ?? {};
  const details = Object.entries(ctx)
    .filter(([key, value]) => value != null && value !== "" && key !== "stderr")
    .map(([key, value]) =>
      `${key}=${Array.isArray(value) ? value.join(",") : String(value)}`,
    );
  const stderr = typeof ctx.stderr === "string" ? ctx.stderr.trim() : "";
  const line = details.length
    ? `${err.name}: ${err.message} (${details.join(" ")})`
    : `${err.name}: ${err.message}`;
  return stderr ? `${line}\n${stderr}` : line;
}
