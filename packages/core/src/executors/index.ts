export { CopyExecutor } from './copy.js';
export { ReplaceExecutor, compilePattern } from './replace.js';
export { RunExecutor, type CommandSpawner } from './run.js';
export {
  interpreterFor,
  spawnPlatformCommand,
  type ExitStatus,
  type Interpreter,
} from './platform.js';
