import { randomUUID } from 'crypto';
import pLimit from 'p-limit';
import { fragmentPath } from '../document/fragmentPath.js';
import type { Fragment } from '../document/types.js';
import { missingVariables, renderTemplate } from '../pipeline/template.js';
import type { BackendRegistry } from '../routing/BackendRegistry.js';
import { BackendRouter } from '../routing/BackendRouter.js';
import { RoutedInvoker } from '../routing/RoutedInvoker.js';
import { PipelineConfigurationError, toErrorDetail } from '../utils/errors.js';
import { RunLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { CompletenessTracker } from './CompletenessTracker.js';
import type { CompletenessTrackerOptions } from './CompletenessTracker.js';
import { ANALYSIS_VARIABLES, loadExpertiseStages, validateAnalysisStages } from './stages.js';
import type {
  AnalysisContext,
  AnalysisStage,
  CellResult,
  CustomAnalysisStage,
  ExpertiseRun,
  ExpertiseRunOptions,
  FragmentAnalysis,
  PromptAnalysisStage,
  StageSummary,
} from './types.js';

/**
 * Expert Analysis Orchestrator
 *
 * Runs every requested analysis stage on every trackable fragment. Each
 * (fragment, stage) cell is independent: a failure is recorded against that
 * cell and the run carries on. A fragment is marked in the checklist once
 * all of its cells have a result, as 'analyzed-with-errors' when any failed.
 *
 * Cells may run concurrently through a bounded pool; marking goes through a
 * single-slot queue so the tracker sees one completion at a time.
 */

export interface OrchestratorOptions {
  router?: BackendRouter;
  /** Per-cell limit when a stage sets none, 0 to disable (default 10 minutes) */
  defaultTimeoutMs?: number;
  /** Defaults for prompt stages that set none */
  temperature?: number;
  maxOutputTokens?: number;
  tracker?: Omit<CompletenessTrackerOptions<FragmentAnalysis>, 'onDuplicateMark'>;
}

interface FragmentState {
  fragment: Fragment;
  results: Record<string, CellResult>;
  remaining: number;
}

export class ExpertAnalysisOrchestrator {
  private readonly invoker: RoutedInvoker;
  private readonly defaultTimeoutMs: number;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly trackerOptions: Omit<CompletenessTrackerOptions<FragmentAnalysis>, 'onDuplicateMark'>;

  constructor(registry: BackendRegistry, options: OrchestratorOptions = {}) {
    this.invoker = new RoutedInvoker(registry, options.router ?? new BackendRouter(registry));
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 600000;
    this.temperature = options.temperature ?? 0.1;
    this.maxOutputTokens = options.maxOutputTokens ?? 4000;
    this.trackerOptions = options.tracker ?? {};
  }

  /**
   * Analyse fragments with the given stages (default: config/expertise-stages.json)
   *
   * @throws PipelineConfigurationError for invalid stages, unknown template
   * variables or a skip list that leaves nothing to run
   */
  async run(
    fragments: Fragment[],
    stages: readonly AnalysisStage[] = loadExpertiseStages(),
    options: ExpertiseRunOptions = {}
  ): Promise<ExpertiseRun> {
    validateAnalysisStages(stages);

    const skip = new Set(options.skipStages ?? []);
    const active = stages.filter((stage) => !skip.has(stage.name));
    this.assertRunnable(stages, active, skip);

    const runId = randomUUID();
    const logger = new RunLogger('ExpertAnalysisOrchestrator', runId);
    const startedAt = new Date().toISOString();
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const signal = options.signal ?? new AbortController().signal;

    const tracker = new CompletenessTracker<FragmentAnalysis>(fragments, {
      ...this.trackerOptions,
      ...(options.countUnnumbered !== undefined ? { countUnnumbered: options.countUnnumbered } : {}),
      onDuplicateMark: (entry) =>
        logger.warn('Fragment completed twice', { fragmentId: entry.fragmentId, markCount: entry.markCount }),
    });
    const trackable = tracker.trackableFragments();
    const checklist = tracker.checklistText();

    logger.started({
      fragments: trackable.length,
      stages: active.map((stage) => stage.name),
      skipped: [...skip],
      concurrency,
    });

    const pool = pLimit(concurrency);
    const bookkeeping = pLimit(1);
    const states = new Map<string, FragmentState>(
      trackable.map((fragment) => [fragment.id, { fragment, results: {}, remaining: active.length }])
    );
    const completions: Array<Promise<void>> = [];
    const callbackErrors: string[] = [];
    let completed = 0;

    const complete = async (state: FragmentState): Promise<void> => {
      const analysis: FragmentAnalysis = {
        fragmentId: state.fragment.id,
        results: state.results,
        hasErrors: Object.values(state.results).some((result) => !result.success),
      };
      tracker.mark(state.fragment.id, analysis, analysis.hasErrors ? 'analyzed-with-errors' : 'analyzed');
      completed++;

      logger.debug('Fragment analysed', {
        fragmentId: state.fragment.id,
        hasErrors: analysis.hasErrors,
        progress: `${completed}/${trackable.length}`,
      });

      if (options.onFragmentComplete) {
        try {
          await options.onFragmentComplete(state.fragment, analysis, { completed, total: trackable.length });
        } catch (error) {
          logger.error('onFragmentComplete failed', error, { fragmentId: state.fragment.id });
          callbackErrors.push(`${state.fragment.id}: ${toErrorDetail(error)}`);
        }
      }
    };

    const cells = trackable.flatMap((fragment) =>
      active.map((stage) =>
        pool(async (): Promise<CellResult | null> => {
          if (signal.aborted) {
            return null;
          }

          const context: AnalysisContext = {
            path: fragmentPath(fragment, fragments),
            checklist,
            signal,
          };
          const result =
            stage.kind === 'prompt'
              ? await this.runPrompt(stage, fragment, context)
              : await this.runCustom(stage, fragment, context);

          if (!result.success) {
            logger.warn('Analysis cell failed', {
              fragmentId: fragment.id,
              stageName: stage.name,
              error: result.errorDetail,
            });
          }

          const state = states.get(fragment.id);
          if (state) {
            state.results[stage.name] = result;
            state.remaining--;
            if (state.remaining === 0) {
              completions.push(bookkeeping(() => complete(state)));
            }
          }
          return result;
        })
      )
    );

    const settled = await Promise.all(cells);
    await Promise.all(completions);

    const attempted = settled.filter((result): result is CellResult => result !== null);
    const report = tracker.report();
    const cancelled = attempted.length < settled.length;

    const run: ExpertiseRun = {
      runId,
      cells: attempted,
      matrix: buildMatrix(attempted),
      report,
      stageSummaries: summarizeStages(active, attempted),
      stageNames: active.map((stage) => stage.name),
      cancelled,
      callbackErrors,
      startedAt,
      completedAt: new Date().toISOString(),
    };

    if (cancelled) {
      logger.warn('Run cancelled', {
        attempted: attempted.length,
        planned: settled.length,
        missing: report.missingIds.length,
      });
    } else {
      logger.completed({
        analyzed: report.analyzed,
        total: report.total,
        analyzedWithErrors: report.analyzedWithErrorsIds.length,
      });
    }

    return run;
  }

  private assertRunnable(stages: readonly AnalysisStage[], active: AnalysisStage[], skip: Set<string>): void {
    const known = new Set(stages.map((stage) => stage.name));
    const unknown = [...skip].filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new PipelineConfigurationError(`Unknown stages in skip list: ${unknown.join(', ')}`);
    }

    if (active.length === 0) {
      throw new PipelineConfigurationError('Every stage is skipped; nothing to run');
    }

    for (const stage of active) {
      if (stage.kind !== 'prompt') continue;
      const missing = missingVariables(stage.promptTemplate, ANALYSIS_VARIABLES);
      if (missing.length > 0) {
        throw new PipelineConfigurationError(
          `Stage "${stage.name}" uses unknown template variables: ${missing.map((name) => `{${name}}`).join(', ')}`
        );
      }
    }
  }

  private async runPrompt(stage: PromptAnalysisStage, fragment: Fragment, context: AnalysisContext): Promise<CellResult> {
    const startTime = new Date().toISOString();
    let backendId: string | null = null;

    try {
      const prompt = renderTemplate(stage.promptTemplate, {
        text: fragment.text,
        number: fragment.number,
        title: fragment.title ?? '',
        type: fragment.type,
        path: context.path,
        checklist: context.checklist,
      });
      const call = {
        prompt,
        systemInstruction: stage.systemInstruction,
        categoryHint: stage.categoryHint,
      };
      const profile = this.invoker.plan(call);
      backendId = profile.chosenBackend;

      const { output } = await withTimeout(
        (signal) =>
          this.invoker.invoke(
            {
              ...call,
              options: {
                temperature: stage.temperature ?? this.temperature,
                maxOutputTokens: stage.maxOutputTokens ?? this.maxOutputTokens,
                signal,
              },
            },
            profile
          ),
        stage.timeoutMs ?? this.defaultTimeoutMs,
        `${stage.name}:${fragment.id}`,
        context.signal
      );

      return cell(fragment, stage, startTime, { success: true, output, errorDetail: null, backendId });
    } catch (error) {
      return cell(fragment, stage, startTime, {
        success: false,
        output: null,
        errorDetail: toErrorDetail(error),
        backendId,
      });
    }
  }

  private async runCustom(stage: CustomAnalysisStage, fragment: Fragment, context: AnalysisContext): Promise<CellResult> {
    const startTime = new Date().toISOString();

    try {
      const output = await stage.analyze(fragment, context);
      return cell(fragment, stage, startTime, { success: true, output, errorDetail: null, backendId: null });
    } catch (error) {
      return cell(fragment, stage, startTime, {
        success: false,
        output: null,
        errorDetail: toErrorDetail(error),
        backendId: null,
      });
    }
  }
}

function cell(
  fragment: Fragment,
  stage: AnalysisStage,
  startTime: string,
  outcome: Pick<CellResult, 'success' | 'output' | 'errorDetail' | 'backendId'>
): CellResult {
  return {
    fragmentId: fragment.id,
    stageName: stage.name,
    ...outcome,
    startTime,
    endTime: new Date().toISOString(),
  };
}

function buildMatrix(cells: CellResult[]): Record<string, Record<string, CellResult>> {
  const matrix: Record<string, Record<string, CellResult>> = {};
  for (const result of cells) {
    matrix[result.fragmentId] ??= {};
    matrix[result.fragmentId][result.stageName] = result;
  }
  return matrix;
}

function summarizeStages(stages: AnalysisStage[], cells: CellResult[]): StageSummary[] {
  return stages.map((stage) => {
    const forStage = cells.filter((result) => result.stageName === stage.name);
    const succeeded = forStage.filter((result) => result.success).length;
    return {
      stageName: stage.name,
      title: stage.title ?? stage.name,
      attempted: forStage.length,
      succeeded,
      failed: forStage.length - succeeded,
    };
  });
}
