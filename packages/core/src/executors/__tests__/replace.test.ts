import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, readFile, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { ReplaceExecutor, compilePattern } from '../replace.js';
import { PatternError } from '../../errors.js';
import type { ReplaceTask, RunContext } from '../../types.js';
import { contextFor, createTempDir, listFiles, removeTempDir, writeTree } from '../../__tests__/test-helpers.js';

describe('ReplaceExecutor', () => {
  let testDir: string;
  let context: RunContext;
  let executor: ReplaceExecutor;

  beforeEach(async () => {
    testDir = await createTempDir('replace-test');
    context = contextFor(testDir);
    executor = new ReplaceExecutor();
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  const replaceTask = (overrides: Partial<ReplaceTask> = {}): ReplaceTask => ({
    type: 'replace',
    target: 'version.txt',
    pattern: 'version=\\d+\\.\\d+\\.\\d+',
    replacement: 'version=2.0.0',
    ...overrides,
  });

  const read = (name: string) => readFile(join(testDir, name), 'utf-8');

  it('should rewrite every match in the target file', async () => {
    await writeFile(join(testDir, 'version.txt'), 'version=1.0.0');

    const outcome = await executor.execute(replaceTask(), context);

    expect(outcome).toEqual({ status: 'success' });
    expect(await read('version.txt')).toBe('version=2.0.0');
  });

  it('should substitute capture groups', async () => {
    await writeFile(join(testDir, 'version.txt'), 'name = "app"\nmode = "prod"\n');

    await executor.execute(
      replaceTask({ pattern: '(\\w+) = "(\\w+)"', replacement: '$2 = "$1"' }),
      context
    );

    expect(await read('version.txt')).toBe('app = "name"\nprod = "mode"\n');
  });

  it('should succeed without rewriting the file when nothing matches', async () => {
    const path = join(testDir, 'version.txt');
    await writeFile(path, 'no version here');
    const before = await stat(path);

    const outcome = await executor.execute(replaceTask(), context);

    expect(outcome).toEqual({ status: 'success' });
    expect(await read('version.txt')).toBe('no version here');
    expect((await stat(path)).mtimeMs).toBe(before.mtimeMs);
  });

  it('should be idempotent once the replacement is a fixed point', async () => {
    await writeFile(join(testDir, 'version.txt'), 'foo and foo');
    const task = replaceTask({ pattern: 'foo', replacement: 'bar' });

    await executor.execute(task, context);
    const once = await read('version.txt');
    await executor.execute(task, context);

    expect(once).toBe('bar and bar');
    expect(await read('version.txt')).toBe(once);
  });

  it('should apply extra regex flags', async () => {
    await writeFile(join(testDir, 'version.txt'), 'Hello HELLO hello');

    await executor.execute(replaceTask({ pattern: 'hello', replacement: 'bye', flags: 'i' }), context);

    expect(await read('version.txt')).toBe('bye bye bye');
  });

  it('should report TargetNotFoundError for a missing target', async () => {
    const outcome = await executor.execute(replaceTask(), context);

    expect(outcome).toEqual({
      status: 'failure',
      kind: 'TargetNotFoundError',
      detail: `Target ${join(testDir, 'version.txt')} does not exist`,
    });
  });

  it('should report TargetNotFoundError for a directory target', async () => {
    await mkdir(join(testDir, 'version.txt'));

    const outcome = await executor.execute(replaceTask(), context);

    expect(outcome).toEqual({
      status: 'failure',
      kind: 'TargetNotFoundError',
      detail: `Target ${join(testDir, 'version.txt')} is not a regular file`,
    });
  });

  it('should report PatternError and leave the file untouched', async () => {
    await writeFile(join(testDir, 'version.txt'), 'version=1.0.0');

    const outcome = await executor.execute(replaceTask({ pattern: '(unclosed' }), context);

    expect(outcome).toMatchObject({ status: 'failure', kind: 'PatternError' });
    expect(await read('version.txt')).toBe('version=1.0.0');
  });

  it('should report EncodingError for bytes that are not valid UTF-8', async () => {
    const bytes = Buffer.from([0x61, 0xc3, 0x28]);
    await writeFile(join(testDir, 'version.txt'), bytes);

    const outcome = await executor.execute(replaceTask({ pattern: 'a', replacement: 'b' }), context);

    expect(outcome).toMatchObject({ status: 'failure', kind: 'EncodingError' });
    expect(await readFile(join(testDir, 'version.txt'))).toEqual(bytes);
  });

  it('should read and write UTF-16LE files', async () => {
    await writeFile(join(testDir, 'version.txt'), Buffer.from('key=old', 'utf16le'));

    await executor.execute(
      replaceTask({ pattern: 'old', replacement: 'new', encoding: 'utf-16le' }),
      context
    );

    expect((await readFile(join(testDir, 'version.txt'))).toString('utf16le')).toBe('key=new');
  });

  it('should keep a UTF-8 byte order mark', async () => {
    await writeFile(join(testDir, 'version.txt'), '\uFEFFversion=1.0.0');

    await executor.execute(replaceTask(), context);

    const bytes = await readFile(join(testDir, 'version.txt'));
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.subarray(3).toString('utf-8')).toBe('version=2.0.0');
  });

  it('should preserve the file mode', async () => {
    const path = join(testDir, 'version.txt');
    await writeFile(path, 'version=1.0.0');
    await chmod(path, 0o755);
    const { mode } = await stat(path);

    await executor.execute(replaceTask(), context);

    expect((await stat(path)).mode).toBe(mode);
    expect(await read('version.txt')).toBe('version=2.0.0');
    expect(await listFiles(testDir)).toEqual(['version.txt']);
  });

  describe('glob targets', () => {
    it('should rewrite every matching file', async () => {
      await writeTree(testDir, {
        'dist/a.txt': 'x1',
        'dist/b.txt': 'x2',
        'dist/c.md': 'x3',
      });

      const outcome = await executor.execute(
        replaceTask({ target: 'dist/*.txt', pattern: 'x', replacement: 'y' }),
        context
      );

      expect(outcome).toEqual({ status: 'success' });
      expect(await read('dist/a.txt')).toBe('y1');
      expect(await read('dist/b.txt')).toBe('y2');
      expect(await read('dist/c.md')).toBe('x3');
    });

    it('should match across directories with **', async () => {
      await writeTree(testDir, {
        'dist/app.json': '"v1"',
        'dist/nested/lib.json': '"v1"',
      });

      await executor.execute(
        replaceTask({ target: 'dist/**/*.json', pattern: 'v1', replacement: 'v2' }),
        context
      );

      expect(await read('dist/app.json')).toBe('"v2"');
      expect(await read('dist/nested/lib.json')).toBe('"v2"');
    });

    it('should not read glob characters in the base directory as a pattern', async () => {
      const baseDir = join(testDir, 'proj[v2]');
      await writeTree(baseDir, { 'dist/a.txt': 'x1' });

      const outcome = await executor.execute(
        replaceTask({ target: 'dist/*.txt', pattern: 'x', replacement: 'y' }),
        contextFor(baseDir)
      );

      expect(outcome).toEqual({ status: 'success' });
      expect(await readFile(join(baseDir, 'dist', 'a.txt'), 'utf-8')).toBe('y1');
    });

    it('should expand an absolute glob target', async () => {
      await writeTree(testDir, { 'dist/a.txt': 'x1' });

      await executor.execute(
        replaceTask({ target: join(testDir, 'dist', '*.txt'), pattern: 'x', replacement: 'y' }),
        context
      );

      expect(await read('dist/a.txt')).toBe('y1');
    });

    it('should succeed when no file matches', async () => {
      const outcome = await executor.execute(replaceTask({ target: 'dist/*.txt' }), context);

      expect(outcome).toEqual({ status: 'success' });
    });

    it('should write nothing when one matching file cannot be decoded', async () => {
      await writeTree(testDir, {
        'dist/a.txt': 'x',
        'dist/b.txt': Buffer.from([0xc3, 0x28]),
      });

      const outcome = await executor.execute(
        replaceTask({ target: 'dist/*.txt', pattern: 'x', replacement: 'y' }),
        context
      );

      expect(outcome).toMatchObject({ status: 'failure', kind: 'EncodingError' });
      expect(await read('dist/a.txt')).toBe('x');
    });
  });
});

describe('compilePattern', () => {
  it('should always add the global flag', () => {
    expect(compilePattern('a').flags).toBe('g');
    expect(compilePattern('a', 'mi').flags).toBe('gim');
  });

  it('should reject unsupported flags', () => {
    expect(() => compilePattern('a', 'y')).toThrow(PatternError);
  });

  it('should reject invalid syntax', () => {
    expect(() => compilePattern('[')).toThrow(PatternError);
  });
});
