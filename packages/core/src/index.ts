/**
 * Packager - Declarative packaging task engine
 *
 * Runs an ordered list of copy, replace and run tasks with fail-fast
 * semantics.
 */

export { TaskOrchestrator } from './orchestrator.js';
export { runPackager } from './runner.js';
export { createRunContext, resolvePath } from './paths.js';
export {
  compileIgnoreRules,
  isIncluded,
  loadIgnoreRules,
  EMPTY_RULE_SET,
  IGNORE_FILE_NAME,
} from './ignore.js';
export { expandReplacement, replaceAllMatches } from './template.js';
export { createConsoleLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export {
  PackagerError,
  InvalidPathError,
  SourceNotFoundError,
  TargetNotFoundError,
  EncodingError,
  PatternError,
  IoError,
  ProcessError,
  ConfigurationError,
  type ErrorKind,
} from './errors.js';

export type { ExecutorRegistry, OrchestratorOptions, OrchestratorEvents } from './orchestrator.js';
export type { RunPackagerOptions, PackagerRun } from './runner.js';
export type { RunContextOptions } from './paths.js';
export type { IgnoreRule, IgnoreRuleSet } from './ignore.js';
export type { ReplaceResult } from './template.js';

export type {
  Task,
  TaskType,
  CopyTask,
  ReplaceTask,
  RunTask,
  TextEncoding,
  RunContext,
  FailureKind,
  TaskOutcome,
  ExecutionResult,
  TaskExecutor,
  RunState,
  RunFailure,
  RunReport,
  LogLevel,
  Logger,
} from './types.js';

// Export executors
export * from './executors/index.js';

// Export configuration loading
export * from './config/index.js';
