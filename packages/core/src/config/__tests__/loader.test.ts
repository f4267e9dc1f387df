import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ConfigLoader, parseConfig } from '../loader.js';
import { ConfigurationError } from '../../errors.js';
import { createTempDir, removeTempDir } from '../../__tests__/test-helpers.js';

function configErrorOf(yaml: string): ConfigurationError {
  try {
    parseConfig(yaml, 'packager.yaml');
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('Configuration Loader', () => {
  describe('parseConfig', () => {
    it('should parse all three task kinds in declaration order', () => {
      const yaml = `
tasks:
  - type: run
    command: npm run build
    args: [--silent]
  - type: copy
    source: build
    destination: dist
    ignoreFile: release.ignore
  - type: replace
    target: dist/version.txt
    pattern: 'version=\\d+'
    replacement: version=2
    flags: i
`;

      const config = parseConfig(yaml, 'packager.yaml');

      expect(config.path).toBe('packager.yaml');
      expect(config.tasks).toEqual([
        { type: 'run', command: 'npm run build', args: ['--silent'] },
        { type: 'copy', source: 'build', destination: 'dist', ignoreFile: 'release.ignore' },
        {
          type: 'replace',
          target: 'dist/version.txt',
          pattern: 'version=\\d+',
          replacement: 'version=2',
          flags: 'i',
        },
      ]);
    });

    it('should freeze the loaded tasks', () => {
      const config = parseConfig('tasks:\n  - type: run\n    command: make\n    args: [all]\n', 'packager.yaml');

      expect(Object.isFrozen(config.tasks)).toBe(true);
      expect(Object.isFrozen(config.tasks[0])).toBe(true);
      const task = config.tasks[0];
      expect(task.type === 'run' && Object.isFrozen(task.args)).toBe(true);
    });

    it('should accept an empty task list', () => {
      expect(parseConfig('tasks: []\n', 'packager.yaml').tasks).toEqual([]);
    });

    it('should reject an empty document', () => {
      const error = configErrorOf('# nothing here\n');

      expect(error.message).toBe('Configuration file packager.yaml is empty or contains only comments');
    });

    it('should reject malformed YAML', () => {
      const error = configErrorOf('tasks: [\n');

      expect(error.message).toMatch(/^Failed to parse YAML in packager\.yaml: /);
    });

    it('should require a tasks list', () => {
      const error = configErrorOf('steps: []\n');

      expect(error.message).toBe('Invalid configuration in packager.yaml');
      expect(error.getDetails()).toContain('tasks: Required');
    });

    it('should reject an unknown task type', () => {
      const error = configErrorOf('tasks:\n  - type: delete\n    path: dist\n');

      expect(error.getDetails()).toContain('tasks.0.type: ');
    });

    it('should reject unknown keys', () => {
      const error = configErrorOf('tasks:\n  - type: run\n    command: make\n    timeout: 10\n');

      expect(error.getDetails()).toBe("tasks.0: Unrecognized key(s) in object: 'timeout'");
    });

    it('should reject empty paths', () => {
      const error = configErrorOf("tasks:\n  - type: copy\n    source: ''\n    destination: dist\n");

      expect(error.getDetails()).toBe('tasks.0.source: Path must not be empty');
    });

    it('should reject unsupported regex flags', () => {
      const error = configErrorOf(
        'tasks:\n  - type: replace\n    target: a.txt\n    pattern: a\n    replacement: b\n    flags: y\n'
      );

      expect(error.getDetails()).toBe('tasks.0.flags: Only the i, m, s and u flags are supported');
    });
  });

  describe('ConfigLoader', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await createTempDir('config-test');
    });

    afterEach(async () => {
      await removeTempDir(testDir);
    });

    it('should load a configuration file', async () => {
      const path = join(testDir, 'packager.yaml');
      await writeFile(path, 'tasks:\n  - type: run\n    command: make\n');

      const config = await new ConfigLoader().load(path);

      expect(config.path).toBe(path);
      expect(config.tasks).toEqual([{ type: 'run', command: 'make' }]);
    });

    it('should report a missing file as ConfigurationError', async () => {
      const path = join(testDir, 'missing.yaml');

      await expect(new ConfigLoader().load(path)).rejects.toThrow(
        new ConfigurationError(`Configuration file not found: ${path}`)
      );
    });
  });
});
