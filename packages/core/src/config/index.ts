/**
 * Configuration - YAML task documents
 */

export {
  PackagerConfigSchema,
  TaskSchema,
  CopyTaskSchema,
  ReplaceTaskSchema,
  RunTaskSchema,
} from './schema.js';

export { ConfigLoader, parseConfig, type PackagerConfig } from './loader.js';
