import { readFileSync } from 'fs';
import { parseArgs } from 'util';
import dotenv from 'dotenv';
import {
  ConfigurationError,
  InvalidPathError,
  createConsoleLogger,
  isLogLevel,
  runPackager,
  type LogLevel,
  type Logger,
  type RunReport,
} from '@packager/core';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_TASK_FAILED = 3;
export const EXIT_IO = 4;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  createLogger(level: LogLevel): Logger;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  createLogger: createConsoleLogger,
};

export const USAGE = [
  'packager --config <path> [options]',
  '',
  'Runs the copy, replace and run tasks of a YAML configuration in order,',
  'stopping at the first failure.',
  '',
  'Options:',
  '  -c, --config <path>      configuration document (required)',
  '  -w, --workdir <path>     base directory for relative paths',
  '                           default: directory of the configuration',
  '  -l, --log-level <level>  error | warn | info | debug (default: info,',
  '                           or PACKAGER_LOG_LEVEL)',
  '  -h, --help               show this help',
  '  -V, --version            print the version',
  '',
  'Exit status: 0 completed, 1 usage error, 2 invalid configuration,',
  '3 task failed, 4 I/O error.',
  '',
].join('\n');

const OPTIONS = {
  config: { type: 'string', short: 'c' },
  workdir: { type: 'string', short: 'w' },
  'log-level': { type: 'string', short: 'l' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const;

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
}

type CliOptions = ReturnType<typeof parseCli>;

export function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function exitCodeFor(report: RunReport): number {
  if (report.status === 'completed') return EXIT_OK;
  return report.failure?.kind === 'IoError' ? EXIT_IO : EXIT_TASK_FAILED;
}

/**
 * Command-line entry point. Resolves to the process exit status.
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let values: CliOptions;
  try {
    values = parseCli(argv);
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (values.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  if (values.version) {
    io.stdout(`packager ${readVersion()}\n`);
    return EXIT_OK;
  }

  const configPath = values.config;
  if (!configPath) {
    io.stderr(`Missing required option --config\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  dotenv.config();
  const level = values['log-level'] ?? process.env.PACKAGER_LOG_LEVEL ?? 'info';
  if (!isLogLevel(level)) {
    io.stderr(`Invalid log level '${level}'\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const logger = io.createLogger(level);
  logger.info('Starting packager', { config: configPath, workdir: values.workdir });

  try {
    const { config, report, context } = await runPackager({
      configPath,
      workdir: values.workdir,
      logger,
    });

    if (report.status === 'completed') {
      logger.info(`All ${report.results.length} task(s) executed successfully`, { baseDir: context.baseDir });
    } else if (report.failure) {
      io.stderr(
        `Task ${report.failure.index + 1} of ${config.tasks.length} failed (${report.failure.kind}): ${report.failure.detail}\n`
      );
    }

    return exitCodeFor(report);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(`${error.message}\n${error.errors ? `${error.getDetails()}\n` : ''}`);
      return EXIT_CONFIG;
    }
    if (error instanceof InvalidPathError) {
      io.stderr(`${error.message}\n`);
      return EXIT_CONFIG;
    }

    logger.error('Unexpected failure', { error: error instanceof Error ? error.message : 'Unknown' });
    return EXIT_USAGE;
  }
}
