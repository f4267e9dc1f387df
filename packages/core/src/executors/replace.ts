import { chmod, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import {
  EncodingError,
  IoError,
  PatternError,
  TargetNotFoundError,
  describeError,
  toFailure,
} from '../errors.js';
import { expandGlob, hasGlobMagic, splitGlob } from '../glob.js';
import { resolvePath } from '../paths.js';
import { replaceAllMatches } from '../template.js';
import type {
  Logger,
  ReplaceTask,
  RunContext,
  TaskExecutor,
  TaskOutcome,
  TextEncoding,
} from '../types.js';

const ALLOWED_FLAGS = /^[imsu]*$/;

interface PendingWrite {
  path: string;
  text: string;
  mode: number;
}

/**
 * Replace Executor - Regex substitution inside text files
 *
 * All target files are read, decoded and transformed before anything is
 * written, and each write goes through a temporary file and a rename, so a
 * failure leaves the original content in place. Files without a match are
 * not touched at all.
 */
export class ReplaceExecutor implements TaskExecutor<ReplaceTask> {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async execute(task: ReplaceTask, context: RunContext): Promise<TaskOutcome> {
    try {
      const target = resolvePath(task.target, context);
      const encoding = task.encoding ?? 'utf-8';

      const files = hasGlobMagic(task.target) ? await expandTarget(task.target, context) : [await checkTarget(target)];
      if (files.length === 0) {
        this.logger?.warn(`No files match ${target}`);
        return { status: 'success' };
      }

      const contents: PendingWrite[] = [];
      for (const file of files) {
        contents.push(await readText(file, encoding));
      }

      const regex = compilePattern(task.pattern, task.flags);

      const pending: PendingWrite[] = [];
      for (const { path, text, mode } of contents) {
        const result = replaceAllMatches(text, regex, task.replacement);
        this.logger?.debug(`${result.count} match(es) in ${path}`);
        if (result.count > 0) {
          pending.push({ path, text: result.text, mode });
        }
      }

      for (const write of pending) {
        await writeAtomic(write, encoding);
      }

      this.logger?.info(`Replaced matches in ${pending.length} of ${files.length} file(s)`, {
        pattern: task.pattern,
      });
      return { status: 'success' };
    } catch (error) {
      const outcome = toFailure(error, task.target);
      this.logger?.error('Replace failed', outcome);
      return outcome;
    }
  }
}

async function expandTarget(declared: string, context: RunContext): Promise<string[]> {
  const { prefix, pattern } = splitGlob(declared);
  const root = prefix ? resolvePath(prefix, context) : context.baseDir;
  return expandGlob(root, pattern);
}

async function checkTarget(path: string): Promise<string> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new TargetNotFoundError(path, 'is not a regular file');
    }
    return path;
  } catch (error) {
    if (error instanceof TargetNotFoundError) throw error;
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new TargetNotFoundError(path);
    }
    throw new IoError(path, error);
  }
}

async function readText(path: string, encoding: TextEncoding): Promise<PendingWrite> {
  let bytes: Buffer;
  let mode: number;
  try {
    bytes = await readFile(path);
    mode = (await stat(path)).mode & 0o7777;
  } catch (error) {
    throw new IoError(path, error);
  }

  try {
    // ignoreBOM keeps a byte order mark in the text so it is written back
    const decoder = new TextDecoder(encoding, { fatal: true, ignoreBOM: true });
    return { path, text: decoder.decode(bytes), mode };
  } catch {
    throw new EncodingError(path, encoding);
  }
}

/**
 * Compile a task pattern. The global flag is always set; extra flags are
 * limited to `i`, `m`, `s` and `u`.
 */
export function compilePattern(pattern: string, flags = ''): RegExp {
  if (!ALLOWED_FLAGS.test(flags)) {
    throw new PatternError(pattern, `unsupported flags '${flags}'`);
  }

  try {
    return new RegExp(pattern, `g${[...new Set(flags)].join('')}`);
  } catch (error) {
    throw new PatternError(pattern, describeError(error));
  }
}

async function writeAtomic(write: PendingWrite, encoding: TextEncoding): Promise<void> {
  const tmp = `${write.path}.${process.pid}.tmp`;
  const bytes = Buffer.from(write.text, encoding === 'utf-8' ? 'utf8' : 'utf16le');

  try {
    await writeFile(tmp, bytes, { mode: write.mode });
    await chmod(tmp, write.mode);
    await rename(tmp, write.path);
  } catch (error) {
    await rm(tmp, { force: true });
    throw new IoError(write.path, error);
  }
}
