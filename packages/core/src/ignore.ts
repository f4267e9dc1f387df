/**
 * Ignore Matcher - gitignore-style filtering for copied directory trees
 *
 * Supported subset:
 * - blank lines and `#` comments are skipped
 * - `!pattern` re-includes a previously excluded path
 * - `pattern/` matches directories only
 * - `/pattern` is anchored to the tree root, anything else matches at any depth
 * - `*`, `?` and `[...]` stay within a segment, `**` spans segments
 *
 * Rules are evaluated in file order and the last matching rule wins.
 */

import { readFile } from 'fs/promises';
import { Minimatch } from 'minimatch';
import { IoError } from './errors.js';

export const IGNORE_FILE_NAME = '.gitignore';

export interface IgnoreRule {
  readonly pattern: string;
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  readonly anchored: boolean;
  readonly matcher: Minimatch;
}

export type IgnoreRuleSet = readonly IgnoreRule[];

export const EMPTY_RULE_SET: IgnoreRuleSet = Object.freeze([]);

const MATCH_OPTIONS = {
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true,
};

/**
 * Compile the contents of an ignore file into an ordered rule set
 */
export function compileIgnoreRules(contents: string): IgnoreRuleSet {
  const rules: IgnoreRule[] = [];

  for (const rawLine of contents.split(/\r?\n/)) {
    const rule = compileLine(rawLine);
    if (rule) rules.push(rule);
  }

  return Object.freeze(rules);
}

function compileLine(rawLine: string): IgnoreRule | null {
  let line = trimTrailingWhitespace(rawLine);
  if (line.length === 0 || line.startsWith('#')) return null;

  let negated = false;
  if (line.startsWith('!')) {
    negated = true;
    line = line.slice(1);
  } else if (line.startsWith('\\#') || line.startsWith('\\!')) {
    line = line.slice(1);
  }

  let directoryOnly = false;
  if (line.endsWith('/')) {
    directoryOnly = true;
    line = line.replace(/\/+$/, '');
  }

  let anchored = false;
  if (line.startsWith('/')) {
    anchored = true;
    line = line.replace(/^\/+/, '');
  }

  if (line.length === 0) return null;

  const glob = anchored || line.startsWith('**/') ? line : `**/${line}`;

  return Object.freeze({
    pattern: line,
    negated,
    directoryOnly,
    anchored,
    matcher: new Minimatch(glob, MATCH_OPTIONS),
  });
}

// Trailing blanks are dropped unless escaped with a backslash
function trimTrailingWhitespace(line: string): string {
  let end = line.length;
  while (end > 0 && /[ \t\r]/.test(line[end - 1] ?? '')) {
    if (line[end - 2] === '\\') break;
    end--;
  }
  return line.slice(0, end);
}

type Verdict = 'included' | 'excluded' | undefined;

function evaluate(ruleSet: IgnoreRuleSet, path: string, isDirectory: boolean): Verdict {
  return ruleSet.reduce<Verdict>((verdict, rule) => {
    if (rule.directoryOnly && !isDirectory) return verdict;
    if (!rule.matcher.match(path)) return verdict;
    return rule.negated ? 'included' : 'excluded';
  }, undefined);
}

/**
 * Decide whether a path (relative to the tree root, `/`-separated) is kept.
 * Any excluded ancestor directory excludes the path as well.
 */
export function isIncluded(ruleSet: IgnoreRuleSet, relativePath: string, isDirectory: boolean): boolean {
  if (ruleSet.length === 0) return true;

  const segments = relativePath.split(/[\\/]+/).filter((s) => s.length > 0 && s !== '.');
  if (segments.length === 0) return true;

  for (let i = 1; i < segments.length; i++) {
    const ancestor = segments.slice(0, i).join('/');
    if (evaluate(ruleSet, ancestor, true) === 'excluded') return false;
  }

  return evaluate(ruleSet, segments.join('/'), isDirectory) !== 'excluded';
}

/**
 * Read and compile an ignore file. A missing file yields an empty rule set.
 */
export async function loadIgnoreRules(filePath: string): Promise<IgnoreRuleSet> {
  let contents: string;
  try {
    contents = await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return EMPTY_RULE_SET;
    }
    throw new IoError(filePath, error);
  }

  return compileIgnoreRules(contents);
}
