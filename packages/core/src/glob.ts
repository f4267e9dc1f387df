import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import { Minimatch } from 'minimatch';
import { IoError } from './errors.js';

const MAGIC = /[*?[]/;

export function hasGlobMagic(path: string): boolean {
  return MAGIC.test(path);
}

export interface GlobParts {
  /** Leading segments without glob characters, empty when the pattern starts with one. */
  prefix: string;
  /** The remaining segments, joined with `/`. */
  pattern: string;
}

/**
 * Split a declared glob into its literal directory prefix and the part
 * that is matched. Only the declared text is inspected, so whatever the
 * prefix is later resolved against is never read as glob syntax.
 */
export function splitGlob(declared: string): GlobParts {
  const segments = declared.split(/[\\/]/);
  const firstMagic = segments.findIndex((segment) => MAGIC.test(segment));
  if (firstMagic === -1) {
    return { prefix: '', pattern: segments.join('/') };
  }

  const literal = segments.slice(0, firstMagic);
  const prefix = literal.length === 1 && literal[0] === '' ? '/' : literal.join('/');
  return { prefix, pattern: segments.slice(firstMagic).join('/') };
}

/**
 * Expand a glob pattern, relative to the literal directory `root`, into
 * the regular files it matches, sorted lexicographically. Directories are
 * pruned as soon as no file beneath them can match.
 */
export async function expandGlob(root: string, pattern: string): Promise<string[]> {
  const matcher = new Minimatch(pattern, { dot: true, nobrace: true, noext: true });

  const matches: string[] = [];
  await walk(root, '', matcher, matches);

  return matches.sort().map((match) => join(root, ...match.split('/')));
}

async function walk(dir: string, relative: string, matcher: Minimatch, matches: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return;
    throw new IoError(dir, error);
  }

  for (const entry of entries) {
    const path = relative ? `${relative}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (matcher.match(path, true)) {
        await walk(join(dir, entry.name), path, matcher, matches);
      }
    } else if (entry.isFile() && matcher.match(path)) {
      matches.push(path);
    }
  }
}
