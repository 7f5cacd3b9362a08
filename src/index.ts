export {
  runMirror,
  syncOne,
  createMirrorContext,
  type MirrorContext,
  type MirrorOptions,
} from "./orchestrator.js";

export { selectBase, compareChoices, type BaseChoice } from "./base-selector.js";
export { dateDistance } from "./distance.js";

export {
  parseSnapshotDate,
  isSnapshotDate,
  dayOrdinal,
  compareSnapshotDates,
  type SnapshotDate,
} from "./snapshot-date.js";

export {
  DirectorySnapshotRepository,
  missingDates,
  latestDate,
  sortDates,
  type SnapshotRepository,
} from "./snapshot-set.js";

export {
  ProcessExecutor,
  DryRunExecutor,
  type OperationExecutor,
} from "./executor.js";

export {
  ReflinkDiffTool,
  planCopies,
  scanTree,
  copyConflict,
  type StructuralDiffTool,
  type DiffTrees,
  type DiffMode,
  type PlannedCopy,
  type DiffResult,
} from "./reflink-diff.js";

export { type Operation, commandLine } from "./commands.js";
export { loadToolConfig, DEFAULT_TOOLS, type ToolConfig } from "./config.js";

export {
  MirrorError,
  PreconditionError,
  InvalidSnapshotNameError,
  ExternalToolError,
  describeError,
  type OperationStep,
} from "./errors.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
