/**
 * Processor plugin.
 * Builds the flow loader and the custom-workflow activity from configuration
 * and decorates the app instance with both.
 */
import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Env } from '../config/index.js';
import { createChunkSourceFactory } from '../modules/citations/chunk-client.js';
import { CustomWorkflowActivity, type CustomWorkflowActivityDeps } from '../modules/custom-workflow/activity.js';
import { resolveFlowsDir } from '../modules/flows/directory.js';
import { FlowLoader } from '../modules/flows/loader.js';
import { createHttpFlowRunnerFactory } from '../modules/runner/http-runner.js';

declare module 'fastify' {
  interface FastifyInstance {
    flowLoader: FlowLoader;
    customWorkflowActivity: CustomWorkflowActivity;
  }
}

export interface ProcessorPluginOptions {
  config: Env;
  /** Overrides of the collaborators built from config (tests swap in fakes). */
  overrides?: Partial<Pick<CustomWorkflowActivityDeps, 'runnerFactory' | 'chunkSourceFactory'>> & {
    flowsDir?: string;
  };
}

export const processorPlugin = fp(async function (
  app: FastifyInstance,
  options: ProcessorPluginOptions,
): Promise<void> {
  const { config, overrides = {} } = options;

  const flowsDir = resolveFlowsDir(config, overrides.flowsDir);
  const flowLoader = new FlowLoader({ flowsDir, logger: app.log });

  const activity = new CustomWorkflowActivity({
    flowLoader,
    runnerFactory: overrides.runnerFactory ?? createHttpFlowRunnerFactory(config),
    chunkSourceFactory: overrides.chunkSourceFactory ?? createChunkSourceFactory(config),
    logger: app.log,
    defaultFlow: config.FLOWQA_DEFAULT_FLOW,
    legacyCitationFlows: config.FLOWQA_LEGACY_CITATION_FLOWS,
  });

  app.decorate('flowLoader', flowLoader);
  app.decorate('customWorkflowActivity', activity);

  if (!config.FLOWQA_RUNNER_URL && !overrides.runnerFactory) {
    app.log.warn('FLOWQA_RUNNER_URL is not set; jobs will fail with DEPENDENCY_UNAVAILABLE');
  }
  if (!config.FLOWQA_CHUNK_SERVICE_URL && !overrides.chunkSourceFactory) {
    app.log.warn('FLOWQA_CHUNK_SERVICE_URL is not set; answers citing content will fail enrichment');
  }

  app.log.info({ flowsDir, defaultFlow: config.FLOWQA_DEFAULT_FLOW }, 'Flow processor initialized');
});
