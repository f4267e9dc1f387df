import { stat } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { InvalidPathError } from './errors.js';
import type { RunContext } from './types.js';

export interface RunContextOptions {
  configPath: string;
  workdir?: string;
}

/**
 * Compute the base directory of a run: the explicit working directory when
 * given, otherwise the directory holding the configuration document.
 * Relative inputs are taken from the process working directory.
 */
export async function createRunContext(options: RunContextOptions): Promise<RunContext> {
  const baseDir =
    options.workdir !== undefined
      ? resolveAgainst(process.cwd(), options.workdir)
      : dirname(resolveAgainst(process.cwd(), options.configPath));

  let isDirectory = false;
  try {
    isDirectory = (await stat(baseDir)).isDirectory();
  } catch {
    isDirectory = false;
  }

  if (!isDirectory) {
    throw new InvalidPathError(baseDir, 'base directory does not exist');
  }

  return Object.freeze({ baseDir });
}

/**
 * Resolve a path as declared by a task. `..` segments may leave the base
 * directory; packaging tasks reach sibling directories that way.
 */
export function resolvePath(declaredPath: string, context: RunContext): string {
  return resolveAgainst(context.baseDir, declaredPath);
}

function resolveAgainst(baseDir: string, declaredPath: string): string {
  if (declaredPath.length === 0) {
    throw new InvalidPathError(declaredPath, 'path is empty');
  }
  if (declaredPath.includes('\0')) {
    throw new InvalidPathError(declaredPath, 'path contains a NUL byte');
  }

  if (isAbsolute(declaredPath)) return declaredPath;

  return resolve(baseDir, declaredPath);
}
