import { EventEmitter } from 'eventemitter3';
import { toFailure } from './errors.js';
import { CopyExecutor, ReplaceExecutor, RunExecutor } from './executors/index.js';
import type {
  CopyTask,
  ExecutionResult,
  Logger,
  ReplaceTask,
  RunContext,
  RunFailure,
  RunReport,
  RunState,
  RunTask,
  Task,
  TaskExecutor,
  TaskOutcome,
} from './types.js';

export interface ExecutorRegistry {
  copy: TaskExecutor<CopyTask>;
  replace: TaskExecutor<ReplaceTask>;
  run: TaskExecutor<RunTask>;
}

export interface OrchestratorOptions {
  logger?: Logger;
  executors?: Partial<ExecutorRegistry>;
}

export interface OrchestratorEvents {
  'task:start': (index: number, task: Task) => void;
  'task:complete': (result: ExecutionResult) => void;
  'task:failed': (result: ExecutionResult) => void;
  'run:complete': (report: RunReport) => void;
}

/**
 * TaskOrchestrator - Runs an ordered task list, one task at a time
 *
 * The first failing task aborts the run; later tasks are never started and
 * earlier ones are not rolled back. An orchestrator runs exactly once.
 *
 * @example
 * ```typescript
 * const orchestrator = new TaskOrchestrator(config.tasks, context, { logger });
 * orchestrator.on('task:failed', (result) => console.error(result.outcome));
 *
 * const report = await orchestrator.run();
 * if (report.status === 'aborted') process.exitCode = 3;
 * ```
 */
export class TaskOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly tasks: readonly Task[];
  private readonly context: RunContext;
  private readonly executors: ExecutorRegistry;
  private logger?: Logger;
  private state: RunState = { phase: 'not_started' };

  constructor(tasks: readonly Task[], context: RunContext, options: OrchestratorOptions = {}) {
    super();
    this.tasks = tasks;
    this.context = context;
    this.logger = options.logger;
    this.executors = {
      copy: options.executors?.copy ?? new CopyExecutor(options.logger),
      replace: options.executors?.replace ?? new ReplaceExecutor(options.logger),
      run: options.executors?.run ?? new RunExecutor(options.logger),
    };
  }

  getState(): RunState {
    return { ...this.state };
  }

  async run(): Promise<RunReport> {
    if (this.state.phase !== 'not_started') {
      throw new Error(`Orchestrator has already run (state: ${this.state.phase})`);
    }

    const startTime = Date.now();
    const results: ExecutionResult[] = [];

    this.logger?.info(`Starting run with ${this.tasks.length} task(s)`, { baseDir: this.context.baseDir });

    for (const [index, task] of this.tasks.entries()) {
      this.state = { phase: 'running', index };
      this.emit('task:start', index, task);
      this.logger?.info(`Task ${index + 1}/${this.tasks.length}: ${task.type}`);

      const taskStart = Date.now();
      const outcome = await this.dispatch(task, index);
      const result: ExecutionResult = { index, task, outcome, duration: Date.now() - taskStart };
      results.push(result);

      if (outcome.status === 'failure') {
        this.state = { phase: 'aborted', index };
        this.emit('task:failed', result);
        this.logger?.error(`Task ${index + 1} failed, aborting run`, {
          kind: outcome.kind,
          detail: outcome.detail,
        });

        const failure: RunFailure = { index, kind: outcome.kind, detail: outcome.detail };
        if (outcome.exitCode !== undefined) failure.exitCode = outcome.exitCode;

        const report: RunReport = { status: 'aborted', results, failure, duration: Date.now() - startTime };
        this.emit('run:complete', report);
        return report;
      }

      this.emit('task:complete', result);
    }

    this.state = { phase: 'completed' };
    const report: RunReport = { status: 'completed', results, duration: Date.now() - startTime };

    this.logger?.info('All tasks completed successfully', { duration: report.duration });
    this.emit('run:complete', report);
    return report;
  }

  private async dispatch(task: Task, index: number): Promise<TaskOutcome> {
    try {
      switch (task.type) {
        case 'copy':
          return await this.executors.copy.execute(task, this.context);
        case 'replace':
          return await this.executors.replace.execute(task, this.context);
        case 'run':
          return await this.executors.run.execute(task, this.context);
        default: {
          const unknownTask: never = task;
          throw new Error(`Unknown task type: ${JSON.stringify(unknownTask)}`);
        }
      }
    } catch (error) {
      return toFailure(error, `task ${index + 1}`);
    }
  }
}
