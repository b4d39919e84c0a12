import { describe, it, expect } from 'vitest';
import type { ExpertiseRun } from '../expertise/types.js';
import type { ExecutionRecord, PipelineRun } from '../pipeline/types.js';
import { NoBackendAvailableError } from '../utils/errors.js';
import { couldNotRun, summarizeExpertise, summarizePipelineRun } from './summary.js';

function record(stageIndex: number, success: boolean): ExecutionRecord {
  return {
    stageIndex,
    stageName: `stage${stageIndex}`,
    backendId: 'fast',
    category: 'general',
    estimatedTokens: 10,
    inputSize: 40,
    output: success ? 'out' : null,
    success,
    errorDetail: success ? null : 'ProviderError: overloaded',
    startTime: '2024-01-01T00:00:00.000Z',
    endTime: '2024-01-01T00:00:01.000Z',
  };
}

function pipelineRun(overrides: Partial<PipelineRun>): PipelineRun {
  return {
    runId: 'run-1',
    pipelineName: 'legal-analysis',
    status: 'completed',
    stageCount: 3,
    records: [record(0, true), record(1, true), record(2, true)],
    output: 'out',
    failedStageIndex: null,
    startedAt: '2024-01-01T00:00:00.000Z',
    completedAt: '2024-01-01T00:00:03.000Z',
    durationMs: 3000,
    ...overrides,
  };
}

function expertiseRun(overrides: Partial<ExpertiseRun>): ExpertiseRun {
  return {
    runId: 'run-2',
    cells: [],
    matrix: {},
    report: {
      total: 4,
      analyzed: 4,
      missingIds: [],
      percentage: 1,
      analyzedWithErrorsIds: [],
      duplicateMarks: 0,
      isComplete: true,
    },
    stageSummaries: [],
    stageNames: ['relevance', 'gender'],
    cancelled: false,
    callbackErrors: [],
    startedAt: '2024-01-01T00:00:00.000Z',
    completedAt: '2024-01-01T00:00:05.000Z',
    ...overrides,
  };
}

describe('summarizePipelineRun', () => {
  it('reports a completed run', () => {
    expect(summarizePipelineRun(pipelineRun({}))).toEqual({
      outcome: 'completed',
      percentage: 1,
      message: 'Pipeline "legal-analysis" completed 3 stages',
      failures: [],
    });
  });

  it('treats a failed stage as a run that could not complete', () => {
    const summary = summarizePipelineRun(
      pipelineRun({ status: 'failed', records: [record(0, true), record(1, false)], output: null, failedStageIndex: 1 })
    );

    expect(summary).toEqual({
      outcome: 'could-not-run',
      percentage: 1 / 3,
      message: 'Pipeline "legal-analysis" aborted at stage 1 after 1 of 3 stages',
      failures: ['stage1 (stage 1): ProviderError: overloaded'],
    });
  });

  it('treats cancellation as partial', () => {
    const summary = summarizePipelineRun(pipelineRun({ status: 'cancelled', records: [record(0, true)], output: null }));

    expect(summary.outcome).toBe('partial');
    expect(summary.message).toBe('Pipeline "legal-analysis" cancelled after 1 of 3 stages');
  });
});

describe('summarizeExpertise', () => {
  it('reports a complete run', () => {
    expect(summarizeExpertise(expertiseRun({}))).toEqual({
      outcome: 'completed',
      percentage: 1,
      message: 'All 4 fragments analyzed by 2 stages',
      failures: [],
    });
  });

  it('lists missing fragments and cancellation', () => {
    const summary = summarizeExpertise(
      expertiseRun({
        cancelled: true,
        report: {
          total: 4,
          analyzed: 2,
          missingIds: ['article_3', 'article_4'],
          percentage: 0.5,
          analyzedWithErrorsIds: [],
          duplicateMarks: 0,
          isComplete: false,
        },
      })
    );

    expect(summary).toEqual({
      outcome: 'partial',
      percentage: 0.5,
      message: '2 of 4 fragments analyzed (50.0%); missing: article_3, article_4; run cancelled',
      failures: [],
    });
  });
});

describe('couldNotRun', () => {
  it('wraps the error that stopped the run', () => {
    expect(couldNotRun(new NoBackendAvailableError('No backend available for quick task (0 registered)'))).toEqual({
      outcome: 'could-not-run',
      percentage: 0,
      message: 'Could not run: NoBackendAvailableError: No backend available for quick task (0 registered)',
      failures: ['NoBackendAvailableError: No backend available for quick task (0 registered)'],
    });
  });
});
