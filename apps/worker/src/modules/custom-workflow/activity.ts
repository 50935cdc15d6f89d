/**
 * Custom-workflow activity.
 *
 * Per invocation: resolve flow → build inputs → run → enrich citations →
 * resolve answers → return. Every failure surfaces to the caller; a failed
 * flow never yields partial answers.
 */
import type {
  CustomWorkflowConfig,
  CustomWorkflowOutput,
  FlowDefinition,
  FlowResult,
  JobContext,
  SourceFile,
} from '@flowqa/shared';
import { isAbortError, throwIfAborted } from '../../lib/abort.js';
import type { Logger } from '../../lib/logger.js';
import { errorMessage, isRecord } from '../../lib/records.js';
import { ProcessorError } from '../../types/index.js';
import type { ChunkSource } from '../citations/chunk-client.js';
import { enrichCitations } from '../citations/enrichment.js';
import type { FlowLoader } from '../flows/loader.js';
import {
  buildCustomWorkflowInputs,
  buildSingleSourceInputs,
  selectInputConvention,
  type FlowInputs,
} from '../io/input-builder.js';
import { resolveAnswers, type CitationMode } from '../io/output-resolver.js';
import type { FlowRunner, FlowRunnerFactory } from '../runner/types.js';

export interface CustomWorkflowActivityDeps {
  flowLoader: FlowLoader;
  runnerFactory: FlowRunnerFactory;
  /** Chunk source for a job; undefined when no chunk service is configured. */
  chunkSourceFactory: (ctx: JobContext) => ChunkSource | undefined;
  logger: Logger;
  defaultFlow: string;
  /** Flows predating annotation support: not enriched, resolved in legacy citation mode. */
  legacyCitationFlows?: readonly string[];
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

export interface ResolvedFlow {
  flow: FlowDefinition;
  extraParams: FlowInputs;
  source: 'inline' | 'named';
}

export class CustomWorkflowActivity {
  private readonly legacyCitationFlows: ReadonlySet<string>;

  constructor(private readonly deps: CustomWorkflowActivityDeps) {
    this.legacyCitationFlows = new Set(deps.legacyCitationFlows ?? []);
  }

  async process(
    ctx: JobContext,
    config: CustomWorkflowConfig,
    options: ProcessOptions = {},
  ): Promise<CustomWorkflowOutput> {
    const { signal } = options;
    const log = this.deps.logger.child({ jobId: ctx.id });

    log.info(
      {
        workflowId: config.workflowId || this.deps.defaultFlow,
        firstSourceFiles: config.firstSourceFiles.length,
        secondSourceFiles: config.secondSourceFiles.length,
        questions: config.questions.length,
      },
      'Processing custom workflow job',
    );

    const { flow, extraParams, source } = await this.resolveFlowAndParams(config, log);
    log.info({ flowId: flow.flow_id, source }, 'Flow resolved');

    const convention = selectInputConvention(flow);
    const inputs =
      convention === 'single-source'
        ? buildSingleSourceInputs(config.firstSourceFiles, config.questions, extraParams, log)
        : buildCustomWorkflowInputs(
            config.firstSourceFiles,
            config.secondSourceFiles,
            config.questions,
            extraParams,
            log,
          );
    log.debug({ convention, inputKeys: Object.keys(inputs) }, 'Flow inputs built');
    log.info({ headers: Object.keys(ctx.headers) }, 'Authentication headers available');

    throwIfAborted(signal);
    const runner = this.deps.runnerFactory();
    let outputs: Record<string, unknown>;
    try {
      let result: FlowResult;
      try {
        result = await runner.run({
          flow,
          inputs,
          context: { runId: `custom-workflow-${ctx.id}`, headers: { ...ctx.headers } },
          ...(signal ? { signal } : {}),
        });
      } catch (err) {
        if (isAbortError(err) || err instanceof ProcessorError) throw err;
        log.error({ err }, 'Flow execution failed');
        throw ProcessorError.runnerFailure(`Flow execution failed: ${errorMessage(err)}`);
      }

      log.info({ flowId: flow.flow_id, status: result.status }, 'Flow completed');
      if (result.status !== 'succeeded') {
        const message = `Flow failed with status ${result.status}: ${result.error ?? 'no error reported'}`;
        log.error({ flowId: flow.flow_id }, message);
        throw ProcessorError.runnerFailure(message);
      }
      outputs = result.outputs;
    } finally {
      await this.cleanupRunner(runner, log);
    }

    const citationMode: CitationMode = this.legacyCitationFlows.has(flow.flow_id) ? 'legacy' : 'annotated';
    if (citationMode === 'annotated') {
      outputs = await enrichCitations(
        outputs,
        sourceFilesOf(config),
        this.deps.chunkSourceFactory(ctx),
        { logger: log, ...(signal ? { signal } : {}) },
      );
    } else {
      log.info({ flowId: flow.flow_id }, 'Flow predates annotation support; skipping citation enrichment');
    }

    const answers = resolveAnswers(outputs, config.questions, { citationMode });
    log.info({ answers: answers.length }, 'Custom workflow job completed');

    return {
      answers,
      ...(config.collectionId ? { collectionId: config.collectionId } : {}),
    };
  }

  /** Cleanup failures are logged; they never replace the run's own outcome. */
  private async cleanupRunner(runner: FlowRunner, log: Logger): Promise<void> {
    try {
      await runner.cleanup();
    } catch (err) {
      log.error({ err }, 'Flow runner cleanup failed');
    }
  }

  /**
   * Precedence: inline flow in additionalInputs (JSON holding both `flow_id`
   * and `steps`), then `workflowId`, then the default flow. Any other JSON
   * object in additionalInputs becomes extra flow params.
   */
  async resolveFlowAndParams(config: CustomWorkflowConfig, log: Logger = this.deps.logger): Promise<ResolvedFlow> {
    let extraParams: FlowInputs = {};

    if (config.additionalInputs) {
      let data: unknown;
      try {
        data = JSON.parse(config.additionalInputs);
      } catch (err) {
        log.error({ err: errorMessage(err) }, 'Failed to parse additionalInputs as JSON; ignoring it');
      }

      if (isRecord(data)) {
        if ('flow_id' in data && 'steps' in data) {
          log.info('Using inline flow from additionalInputs');
          return {
            flow: this.deps.flowLoader.loadFromText(config.additionalInputs),
            extraParams: {},
            source: 'inline',
          };
        }
        extraParams = data;
        log.info({ keys: Object.keys(extraParams) }, 'Using additionalInputs as flow params');
      } else if (data !== undefined) {
        log.warn('additionalInputs is not a JSON object; ignoring it');
      }
    }

    const flowName = config.workflowId || this.deps.defaultFlow;
    log.info({ flowName }, 'Loading named flow');
    return { flow: await this.deps.flowLoader.loadByName(flowName), extraParams, source: 'named' };
  }
}

/** Source documents of both sets, first set first. */
export function sourceFilesOf(config: CustomWorkflowConfig): SourceFile[] {
  return [...config.firstSourceFiles, ...config.secondSourceFiles];
}
