import { chmod, copyFile, mkdir, readdir, stat } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { dirname, join, resolve } from 'path';
import { IoError, SourceNotFoundError, toFailure } from '../errors.js';
import {
  EMPTY_RULE_SET,
  IGNORE_FILE_NAME,
  isIncluded,
  loadIgnoreRules,
  type IgnoreRuleSet,
} from '../ignore.js';
import { resolvePath } from '../paths.js';
import type { CopyTask, Logger, RunContext, TaskExecutor, TaskOutcome } from '../types.js';

interface LoadedRules {
  rules: IgnoreRuleSet;
  // The ignore file consulted, if any; it is never copied itself
  file?: string;
}

interface CopyRun extends LoadedRules {
  destination: string;
  copied: number;
}

/**
 * Copy Executor - Mirrors the ignore-filtered part of a source tree into a
 * destination directory
 *
 * Entries are visited in lexicographic order. Files that already exist at
 * the destination are overwritten; nothing is ever deleted there.
 *
 * @example
 * ```typescript
 * const executor = new CopyExecutor(logger);
 * const outcome = await executor.execute(
 *   { type: 'copy', source: 'app', destination: 'dist/app' },
 *   context
 * );
 * ```
 */
export class CopyExecutor implements TaskExecutor<CopyTask> {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async execute(task: CopyTask, context: RunContext): Promise<TaskOutcome> {
    try {
      const source = resolvePath(task.source, context);
      const destination = resolvePath(task.destination, context);

      const sourceStats = await statOrNull(source);
      if (!sourceStats) {
        throw new SourceNotFoundError(source);
      }

      this.logger?.info(`Copying ${source} to ${destination}`);

      if (!sourceStats.isDirectory()) {
        await copyOne(source, destination, sourceStats);
        this.logger?.info('Copied 1 file');
        return { status: 'success' };
      }

      const run: CopyRun = {
        ...(await this.loadRules(task, source, context)),
        destination: resolve(destination),
        copied: 0,
      };

      await this.walk(run, source, '');

      this.logger?.info(`Copied ${run.copied} file(s)`, { destination });
      return { status: 'success' };
    } catch (error) {
      const outcome = toFailure(error, task.source);
      this.logger?.error('Copy failed', outcome);
      return outcome;
    }
  }

  private async loadRules(task: CopyTask, source: string, context: RunContext): Promise<LoadedRules> {
    if (task.useIgnoreFile === false) {
      return { rules: EMPTY_RULE_SET };
    }

    const file =
      task.ignoreFile !== undefined ? resolvePath(task.ignoreFile, context) : join(source, IGNORE_FILE_NAME);

    if (task.ignoreFile !== undefined && !(await statOrNull(file))) {
      throw new SourceNotFoundError(file);
    }

    const rules = await loadIgnoreRules(file);
    this.logger?.debug(`Loaded ${rules.length} ignore rule(s)`, { file });
    return { rules, file: resolve(file) };
  }

  private async walk(run: CopyRun, dir: string, relativeDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new IoError(dir, error);
    }

    // Directories sort as `name/` so the depth-first walk visits files in path order
    const keyed = entries.map((entry) => ({ entry, key: entry.isDirectory() ? `${entry.name}/` : entry.name }));
    keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

    for (const { entry } of keyed) {
      const absolutePath = join(dir, entry.name);
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (absolutePath === run.file) {
        continue;
      }

      if (entry.isSymbolicLink()) {
        this.logger?.warn(`Skipping symbolic link: ${relativePath}`);
        continue;
      }

      if (entry.isDirectory()) {
        if (absolutePath === run.destination) {
          this.logger?.debug(`Skipping destination inside source: ${relativePath}`);
          continue;
        }
        if (!isIncluded(run.rules, relativePath, true)) {
          this.logger?.debug(`Ignored directory: ${relativePath}`);
          continue;
        }
        await this.walk(run, absolutePath, relativePath);
        continue;
      }

      if (!entry.isFile()) {
        this.logger?.warn(`Skipping special file: ${relativePath}`);
        continue;
      }

      if (!isIncluded(run.rules, relativePath, false)) {
        this.logger?.debug(`Ignored file: ${relativePath}`);
        continue;
      }

      await copyOne(absolutePath, join(run.destination, relativePath));
      run.copied++;
      this.logger?.debug(`Copied ${relativePath}`);
    }
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw new IoError(path, error);
  }
}

async function copyOne(from: string, to: string, fromStats?: Stats): Promise<void> {
  try {
    const stats = fromStats ?? (await stat(from));
    await mkdir(dirname(to), { recursive: true });
    await copyFile(from, to);
    await chmod(to, stats.mode & 0o7777);
  } catch (error) {
    throw new IoError(from, error);
  }
}
