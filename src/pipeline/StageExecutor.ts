/**
 * Stage Executor
 *
 * Runs an ordered list of stages strictly one after another: each stage's
 * output becomes the next stage's `{input}`. Generation stages are
 * classified, routed and invoked through the backend registry; transform
 * stages run locally.
 *
 * The first failing stage ends the run. The result keeps the records of
 * the stages that succeeded plus the failing one, and the failing index.
 * Retrying is left to the caller.
 */

import { randomUUID } from 'crypto';
import type { BackendRegistry } from '../routing/BackendRegistry.js';
import { BackendRouter } from '../routing/BackendRouter.js';
import { RoutedInvoker } from '../routing/RoutedInvoker.js';
import type { TaskProfile } from '../routing/types.js';
import { PipelineConfigurationError, toErrorDetail } from '../utils/errors.js';
import { RunLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { RunHistory } from './RunHistory.js';
import { validateStages } from './stageSchema.js';
import { missingVariables, renderTemplate } from './template.js';
import type { TemplateVars } from './template.js';
import type { ExecutionRecord, GenerateStage, PipelineRun, StageDescriptor, TransformStage } from './types.js';

export interface StageExecutorOptions {
  /** Name used in logs and run results */
  name?: string;
  /** Runs kept for inspection (default 10) */
  historyCapacity?: number;
  /** Per-stage limit when a stage sets none, 0 to disable (default 10 minutes) */
  defaultTimeoutMs?: number;
  /** Router to use instead of one built on the registry */
  router?: BackendRouter;
}

export interface ExecuteOptions {
  /** Checked between stages and forwarded to the in-flight backend call */
  signal?: AbortSignal;
}

const RESERVED_VARIABLE = 'input';

export class StageExecutor {
  readonly name: string;
  private readonly stages: readonly StageDescriptor[];
  private readonly invoker: RoutedInvoker;
  private readonly runs: RunHistory<PipelineRun>;
  private readonly defaultTimeoutMs: number;

  constructor(stages: readonly StageDescriptor[], registry: BackendRegistry, options: StageExecutorOptions = {}) {
    validateStages(stages);

    this.stages = [...stages];
    this.name = options.name ?? 'pipeline';
    this.invoker = new RoutedInvoker(registry, options.router ?? new BackendRouter(registry));
    this.runs = new RunHistory(options.historyCapacity ?? 10);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 600000;
  }

  stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * Run every stage in order
   *
   * @throws PipelineConfigurationError when a template uses a variable that
   * `templateVars` does not provide; nothing runs in that case
   */
  async execute(initialInput: string, templateVars: TemplateVars = {}, options: ExecuteOptions = {}): Promise<PipelineRun> {
    this.assertVariables(templateVars);

    const runId = randomUUID();
    const logger = new RunLogger(`StageExecutor:${this.name}`, runId);
    const startedAt = new Date();
    const records: ExecutionRecord[] = [];
    let input = initialInput;
    let failedStageIndex: number | null = null;
    let cancelled = false;

    logger.started({ stages: this.stages.length, inputSize: initialInput.length });

    for (let index = 0; index < this.stages.length; index++) {
      if (options.signal?.aborted) {
        cancelled = true;
        logger.warn('Run cancelled before stage', { stageIndex: index, stageName: this.stages[index].name });
        break;
      }

      const stage = this.stages[index];
      const vars: TemplateVars = { ...templateVars, [RESERVED_VARIABLE]: input };
      const record =
        stage.kind === 'generate'
          ? await this.runGenerate(stage, index, vars, options.signal)
          : await this.runTransform(stage, index, input, vars);

      records.push(record);

      if (!record.success) {
        if (options.signal?.aborted) {
          cancelled = true;
          records.pop();
          logger.warn('Run cancelled during stage', { stageIndex: index, stageName: stage.name });
        } else {
          failedStageIndex = index;
          logger.failed(new Error(record.errorDetail ?? 'Stage failed'), {
            stageIndex: index,
            stageName: stage.name,
          });
        }
        break;
      }

      logger.info('Stage completed', {
        stageIndex: index,
        stageName: stage.name,
        backendId: record.backendId,
        outputSize: record.output?.length ?? 0,
      });
      input = record.output ?? '';
    }

    const completedAt = new Date();
    const status = cancelled ? 'cancelled' : failedStageIndex !== null ? 'failed' : 'completed';
    const run: PipelineRun = {
      runId,
      pipelineName: this.name,
      status,
      stageCount: this.stages.length,
      records,
      output: status === 'completed' ? input : null,
      failedStageIndex,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    this.runs.push(run);

    if (status === 'completed') {
      logger.completed({ stages: records.length, durationMs: run.durationMs });
    }

    return run;
  }

  /**
   * Most recent runs, oldest first
   */
  history(limit?: number): PipelineRun[] {
    return this.runs.list(limit);
  }

  clearHistory(): void {
    this.runs.clear();
  }

  private assertVariables(templateVars: TemplateVars): void {
    const available = [...Object.keys(templateVars), RESERVED_VARIABLE];
    const problems: string[] = [];

    for (const stage of this.stages) {
      if (stage.kind !== 'generate') continue;
      for (const name of missingVariables(stage.promptTemplate, available)) {
        problems.push(`stage "${stage.name}" uses {${name}}`);
      }
    }

    if (problems.length > 0) {
      throw new PipelineConfigurationError(`Missing template variables: ${problems.join('; ')}`, { problems });
    }
  }

  private async runGenerate(
    stage: GenerateStage,
    stageIndex: number,
    vars: TemplateVars,
    signal?: AbortSignal
  ): Promise<ExecutionRecord> {
    const startTime = new Date().toISOString();
    const prompt = renderTemplate(stage.promptTemplate, vars);
    const call = {
      prompt,
      systemInstruction: stage.systemInstruction,
      categoryHint: stage.categoryHint,
    };
    let profile: TaskProfile | null = null;

    try {
      profile = this.invoker.plan(call);
      const chosen = profile;
      const { output } = await withTimeout(
        (callSignal) =>
          this.invoker.invoke(
            {
              ...call,
              options: {
                temperature: stage.temperature,
                maxOutputTokens: stage.maxOutputTokens,
                signal: callSignal,
              },
            },
            chosen
          ),
        stage.timeoutMs ?? this.defaultTimeoutMs,
        stage.name,
        signal
      );

      return {
        stageIndex,
        stageName: stage.name,
        backendId: profile.chosenBackend,
        category: profile.category,
        estimatedTokens: profile.estimatedTokens,
        inputSize: prompt.length,
        output,
        success: true,
        errorDetail: null,
        startTime,
        endTime: new Date().toISOString(),
      };
    } catch (error) {
      return {
        stageIndex,
        stageName: stage.name,
        backendId: profile?.chosenBackend ?? null,
        category: profile?.category ?? null,
        estimatedTokens: profile?.estimatedTokens ?? 0,
        inputSize: prompt.length,
        output: null,
        success: false,
        errorDetail: toErrorDetail(error),
        startTime,
        endTime: new Date().toISOString(),
      };
    }
  }

  private async runTransform(
    stage: TransformStage,
    stageIndex: number,
    input: string,
    vars: TemplateVars
  ): Promise<ExecutionRecord> {
    const startTime = new Date().toISOString();
    const base = {
      stageIndex,
      stageName: stage.name,
      backendId: null,
      category: null,
      estimatedTokens: 0,
      inputSize: input.length,
      startTime,
    };

    try {
      const output = await stage.transform(input, vars);
      return { ...base, output, success: true, errorDetail: null, endTime: new Date().toISOString() };
    } catch (error) {
      return {
        ...base,
        output: null,
        success: false,
        errorDetail: toErrorDetail(error),
        endTime: new Date().toISOString(),
      };
    }
  }
}
