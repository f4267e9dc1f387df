import { ConfigLoader, type PackagerConfig } from './config/index.js';
import { TaskOrchestrator, type OrchestratorOptions } from './orchestrator.js';
import { createRunContext } from './paths.js';
import type { RunContext, RunReport } from './types.js';

export interface RunPackagerOptions extends OrchestratorOptions {
  configPath: string;
  workdir?: string;
}

export interface PackagerRun {
  config: PackagerConfig;
  context: RunContext;
  report: RunReport;
}

/**
 * Load a configuration document and execute its tasks.
 * Configuration and base directory problems are thrown; task failures are
 * reported through `report`.
 */
export async function runPackager(options: RunPackagerOptions): Promise<PackagerRun> {
  const config = await new ConfigLoader(options.logger).load(options.configPath);
  const context = await createRunContext({ configPath: options.configPath, workdir: options.workdir });

  const orchestrator = new TaskOrchestrator(config.tasks, context, {
    logger: options.logger,
    executors: options.executors,
  });
  const report = await orchestrator.run();

  return { config, context, report };
}
