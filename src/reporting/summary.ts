import type { ExpertiseRun } from '../expertise/types.js';
import type { PipelineRun } from '../pipeline/types.js';
import { toErrorDetail } from '../utils/errors.js';

/**
 * Caller-facing outcome of a run
 *
 * 'could-not-run' is a terminal abort (configuration error, no backend, a
 * failed sequential stage); 'partial' means the run finished but some work
 * is missing or failed.
 */
export type RunOutcome = 'completed' | 'partial' | 'could-not-run';

export interface RunSummary {
  outcome: RunOutcome;
  /** Fraction in [0, 1] */
  percentage: number;
  message: string;
  failures: string[];
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function summarizePipelineRun(run: PipelineRun): RunSummary {
  const succeeded = run.records.filter((record) => record.success).length;
  const percentage = run.stageCount === 0 ? 1 : succeeded / run.stageCount;
  const failures = run.records
    .filter((record) => !record.success)
    .map((record) => `${record.stageName} (stage ${record.stageIndex}): ${record.errorDetail ?? 'unknown error'}`);

  switch (run.status) {
    case 'completed':
      return {
        outcome: 'completed',
        percentage,
        message: `Pipeline "${run.pipelineName}" completed ${run.stageCount} stages`,
        failures,
      };
    case 'cancelled':
      return {
        outcome: 'partial',
        percentage,
        message: `Pipeline "${run.pipelineName}" cancelled after ${succeeded} of ${run.stageCount} stages`,
        failures,
      };
    case 'failed':
      return {
        outcome: 'could-not-run',
        percentage,
        message: `Pipeline "${run.pipelineName}" aborted at stage ${run.failedStageIndex ?? succeeded} after ${succeeded} of ${run.stageCount} stages`,
        failures,
      };
  }
}

export function summarizeExpertise(run: ExpertiseRun): RunSummary {
  const { report } = run;
  const failures = run.cells
    .filter((cell) => !cell.success)
    .map((cell) => `${cell.fragmentId} / ${cell.stageName}: ${cell.errorDetail ?? 'unknown error'}`);

  if (report.isComplete && failures.length === 0 && !run.cancelled) {
    return {
      outcome: 'completed',
      percentage: report.percentage,
      message: `All ${report.total} fragments analyzed by ${run.stageNames.length} stages`,
      failures,
    };
  }

  const parts = [`${report.analyzed} of ${report.total} fragments analyzed (${percent(report.percentage)})`];
  if (report.analyzedWithErrorsIds.length > 0) {
    parts.push(`${report.analyzedWithErrorsIds.length} with errors`);
  }
  if (report.missingIds.length > 0) {
    parts.push(`missing: ${report.missingIds.join(', ')}`);
  }
  if (run.cancelled) {
    parts.push('run cancelled');
  }

  return {
    outcome: 'partial',
    percentage: report.percentage,
    message: parts.join('; '),
    failures,
  };
}

/**
 * Summary for a run that raised before producing results
 */
export function couldNotRun(error: unknown): RunSummary {
  const detail = toErrorDetail(error);
  return {
    outcome: 'could-not-run',
    percentage: 0,
    message: `Could not run: ${detail}`,
    failures: [detail],
  };
}
