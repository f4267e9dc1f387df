import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors.js';
import type { Logger, Task } from '../types.js';
import { PackagerConfigSchema } from './schema.js';

export interface PackagerConfig {
  readonly path: string;
  readonly tasks: readonly Task[];
}

/**
 * Parse and validate a YAML configuration document
 *
 * @param yamlContent - Raw YAML document
 * @param path - Where the document came from, used in messages
 * @returns Frozen configuration; declaration order is execution order
 * @throws ConfigurationError if the document is not valid
 *
 * @example
 * ```typescript
 * const config = parseConfig('tasks:\n  - type: run\n    command: make\n', 'packager.yaml');
 * console.log(config.tasks[0].type); // 'run'
 * ```
 */
export function parseConfig(yamlContent: string, path: string): PackagerConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to parse YAML in ${path}: ${error.message}`);
    }
    throw new ConfigurationError(`Unknown error parsing ${path}`);
  }

  if (parsed === null || parsed === undefined) {
    throw new ConfigurationError(`Configuration file ${path} is empty or contains only comments`);
  }

  const result = PackagerConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration in ${path}`, result.error);
  }

  const tasks = result.data.tasks.map((task): Task => {
    if (task.type === 'run' && task.args) {
      return Object.freeze({ ...task, args: Object.freeze([...task.args]) });
    }
    return Object.freeze(task);
  });

  return Object.freeze({ path, tasks: Object.freeze(tasks) });
}

/**
 * Configuration Loader - Reads the task document from disk
 */
export class ConfigLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async load(filePath: string): Promise<PackagerConfig> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`Configuration file not found: ${filePath}`);
      }
      throw new ConfigurationError(
        `Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : 'Unknown'}`
      );
    }

    const config = parseConfig(content, filePath);
    this.logger?.debug(`Loaded ${config.tasks.length} task(s) from ${filePath}`);
    return config;
  }
}
