// src/executor.ts
import { spawn } from "node:child_process";
import { commandLine, type Operation } from "./commands.js";
import { ExternalToolError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

/**
 * Runs (or pretends to run) the mutating external operations of a pass.
 * Both implementations see exactly the same sequence of operations.
 */
export interface OperationExecutor {
  execute(op: Operation): Promise<void>;
}

type ExecutorOptions = {
  logger?: Logger;
};

export class ProcessExecutor implements OperationExecutor {
  private readonly logger: Logger;

  constructor({ logger }: ExecutorOptions = {}) {
    this.logger = logger ?? new NullLogger();
  }

  execute(op: Operation): Promise<void> {
    const line = commandLine(op);
    this.logger.debug(`run: ${line}`, { step: op.step });
    const t = Date.now();
    return new Promise((resolve, reject) => {
      const fail = (message: string, code: number | null, stderr: string) =>
        reject(
          new ExternalToolError(message, op.step, code, {
            command: line,
            paths: op.paths,
            stderr,
          }),
        );

      const child = spawn(op.command, op.args, {
        // stdout passes through so rsync progress stays visible
        stdio: ["ignore", "inherit", "pipe"],
      });

      let errBuf = "";
      child.stderr?.on("data", (d: Buffer | string) => (errBuf += d.toString()));

      child.on("error", (err) =>
        fail(`${op.step} failed to start: ${errorMessage(err)}`, null, errBuf),
      );
      child.on("exit", (code, signal) => {
        if (code === 0) {
          this.logger.debug(`done: ${op.step}`, { ms: Date.now() - t });
          resolve();
          return;
        }
        const status = code != null ? `exit code ${code}` : `signal ${signal}`;
        fail(`${op.step} failed (${status})`, code, errBuf);
      });
    });
  }
}

export class DryRunExecutor implements OperationExecutor {
  readonly operations: Operation[] = [];
  private readonly logger: Logger;

  constructor({ logger }: ExecutorOptions = {}) {
    this.logger = logger ?? new NullLogger();
  }

  async execute(op: Operation): Promise<void> {
    this.operations.push(op);
    this.logger.info(`would run ${commandLine(op)}`);
  }
}
