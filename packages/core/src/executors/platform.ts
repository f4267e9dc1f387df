import { spawn } from 'child_process';

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface Interpreter {
  file: string;
  args: string[];
}

/**
 * Pick the native command interpreter for a platform. Extra arguments are
 * passed to the spawned process as-is, never spliced into the command text.
 */
export function interpreterFor(
  command: string,
  args: readonly string[] = [],
  platform: NodeJS.Platform = process.platform
): Interpreter {
  if (platform === 'win32') {
    return { file: 'cmd', args: ['/C', command, ...args] };
  }
  return { file: 'sh', args: ['-c', command, ...args] };
}

/**
 * Run a command through the platform interpreter with inherited stdio and
 * wait for it to terminate. Rejects only when the process cannot be spawned.
 */
export function spawnPlatformCommand(
  command: string,
  args: readonly string[],
  cwd: string
): Promise<ExitStatus> {
  const interpreter = interpreterFor(command, args);

  return new Promise((resolve, reject) => {
    const child = spawn(interpreter.file, interpreter.args, {
      cwd,
      stdio: 'inherit',
    });

    child.on('error', reject);
    child.on('close', (code, signal) => {
      resolve({ code, signal });
    });
  });
}
