import { ProcessError, describeError, toFailure } from '../errors.js';
import type { Logger, RunContext, RunTask, TaskExecutor, TaskOutcome } from '../types.js';
import { spawnPlatformCommand, type ExitStatus } from './platform.js';

export type CommandSpawner = (command: string, args: readonly string[], cwd: string) => Promise<ExitStatus>;

/**
 * Run Executor - Invokes an external command in the run's base directory
 *
 * Output goes straight to the inherited streams. There is no timeout: a
 * command that never exits blocks the run.
 */
export class RunExecutor implements TaskExecutor<RunTask> {
  private logger?: Logger;
  private spawner: CommandSpawner;

  constructor(logger?: Logger, spawner: CommandSpawner = spawnPlatformCommand) {
    this.logger = logger;
    this.spawner = spawner;
  }

  async execute(task: RunTask, context: RunContext): Promise<TaskOutcome> {
    const args = task.args ?? [];
    this.logger?.info(`Running command: ${task.command}`, { args, cwd: context.baseDir });

    try {
      let status: ExitStatus;
      try {
        status = await this.spawner(task.command, args, context.baseDir);
      } catch (error) {
        throw new ProcessError(task.command, null, `could not be started: ${describeError(error)}`);
      }

      if (status.code === 0) {
        this.logger?.debug(`Command finished: ${task.command}`);
        return { status: 'success' };
      }

      if (status.code !== null) {
        throw new ProcessError(task.command, status.code, `exited with code ${status.code}`);
      }

      throw new ProcessError(task.command, null, `was terminated by ${status.signal ?? 'an unknown signal'}`);
    } catch (error) {
      const outcome = toFailure(error, task.command);
      this.logger?.error('Command failed', outcome);
      return outcome;
    }
  }
}
