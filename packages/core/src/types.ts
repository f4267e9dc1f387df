/**
 * Core types for the Packager task engine
 */

// ============================================================================
// Task Types
// ============================================================================

export interface CopyTask {
  readonly type: 'copy';
  readonly source: string;
  readonly destination: string;
  readonly ignoreFile?: string; // Defaults to <source>/.gitignore
  readonly useIgnoreFile?: boolean; // Default: true
}

export type TextEncoding = 'utf-8' | 'utf-16le';

export interface ReplaceTask {
  readonly type: 'replace';
  readonly target: string; // File path or glob
  readonly pattern: string;
  readonly replacement: string;
  readonly encoding?: TextEncoding;
  readonly flags?: string; // Extra RegExp flags, 'g' is always applied
}

export interface RunTask {
  readonly type: 'run';
  readonly command: string;
  readonly args?: readonly string[];
}

export type Task = CopyTask | ReplaceTask | RunTask;

export type TaskType = Task['type'];

// ============================================================================
// Execution Types
// ============================================================================

/**
 * Base directory shared read-only by every task of a run
 */
export interface RunContext {
  readonly baseDir: string;
}

export type FailureKind =
  | 'InvalidPathError'
  | 'SourceNotFoundError'
  | 'TargetNotFoundError'
  | 'EncodingError'
  | 'PatternError'
  | 'IoError'
  | 'ProcessError';

export type TaskOutcome =
  | { status: 'success' }
  | { status: 'failure'; kind: FailureKind; detail: string; exitCode?: number };

export interface ExecutionResult {
  index: number;
  task: Task;
  outcome: TaskOutcome;
  duration: number;
}

export interface TaskExecutor<T extends Task = Task> {
  execute(task: T, context: RunContext): Promise<TaskOutcome>;
}

export type RunState =
  | { phase: 'not_started' }
  | { phase: 'running'; index: number }
  | { phase: 'completed' }
  | { phase: 'aborted'; index: number };

export interface RunFailure {
  index: number;
  kind: FailureKind;
  detail: string;
  exitCode?: number;
}

export interface RunReport {
  status: 'completed' | 'aborted';
  results: ExecutionResult[];
  failure?: RunFailure;
  duration: number;
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}
