import { describe, it, expect } from 'vitest';
import type { InvocationOptions, LanguageModelBackend } from '../backends/Backend.js';
import { loadPipeline, PIPELINE_PRESETS } from '../config/pipelines.js';
import { BackendRouter } from '../routing/BackendRouter.js';
import type { BackendRegistry } from '../routing/BackendRegistry.js';
import { TaskClassifier } from '../routing/TaskClassifier.js';
import { PipelineConfigurationError, ProviderError } from '../utils/errors.js';
import { capability, fakeRegistry, standardCapabilities, testClassificationConfig } from '../__tests__/fakes.js';
import { parsePipelineDefinition } from './stageSchema.js';
import { StageExecutor } from './StageExecutor.js';
import type { StageExecutorOptions } from './StageExecutor.js';
import type { StageDescriptor } from './types.js';

/**
 * Backend that only settles when its call is aborted
 */
class HangingBackend implements LanguageModelBackend {
  constructor(public readonly id: string) {}

  invoke(_prompt: string, _system: string | undefined, options?: InvocationOptions): Promise<string> {
    return new Promise((_, reject) => {
      options?.signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
    });
  }
}

function executor(stages: StageDescriptor[], registry: BackendRegistry, options: StageExecutorOptions = {}) {
  return new StageExecutor(stages, registry, {
    router: new BackendRouter(registry, new TaskClassifier(testClassificationConfig)),
    ...options,
  });
}

function hangingRegistry(): BackendRegistry {
  const { registry } = fakeRegistry([capability('slow')]);
  registry.register(capability('slow'), new HangingBackend('slow'));
  return registry;
}

const echo = (prompt: string) => `<${prompt}>`;

describe('StageExecutor', () => {
  it('feeds each stage the previous output', async () => {
    const { registry } = fakeRegistry(standardCapabilities(), { responder: echo });
    const run = await executor(
      [
        { kind: 'generate', name: 'first', promptTemplate: 'A {input}' },
        { kind: 'generate', name: 'second', promptTemplate: 'B {input}' },
      ],
      registry
    ).execute('text');

    expect(run.status).toBe('completed');
    expect(run.output).toBe('<B <A text>>');
    expect(run.failedStageIndex).toBeNull();
    expect(run.records.map((record) => record.output)).toEqual(['<A text>', '<B <A text>>']);
    expect(run.records[1]).toMatchObject({
      stageIndex: 1,
      stageName: 'second',
      backendId: 'fast',
      category: 'general',
      inputSize: 'B <A text>'.length,
      success: true,
      errorDetail: null,
    });
  });

  it('stops at the first failing stage', async () => {
    const { registry, backends } = fakeRegistry(standardCapabilities(), {
      responder: (prompt) => {
        if (prompt.startsWith('check')) {
          throw new ProviderError('model overloaded', 'fast');
        }
        return echo(prompt);
      },
    });
    const run = await executor(
      [
        { kind: 'generate', name: 'extract', promptTemplate: 'extract {input}' },
        { kind: 'generate', name: 'check', promptTemplate: 'check {input}' },
        { kind: 'generate', name: 'summarize', promptTemplate: 'summarize {input}' },
      ],
      registry
    ).execute('doc');

    expect(run.status).toBe('failed');
    expect(run.failedStageIndex).toBe(1);
    expect(run.output).toBeNull();
    expect(run.records).toHaveLength(2);
    expect(run.records[0]).toMatchObject({ success: true, output: '<extract doc>' });
    expect(run.records[1]).toMatchObject({
      success: false,
      output: null,
      backendId: 'fast',
      errorDetail: 'ProviderError: model overloaded',
    });
    expect(backends.get('fast')?.calls.map((call) => call.prompt)).toEqual(['extract doc', 'check <extract doc>']);
  });

  it('passes caller variables and stage options to the backend', async () => {
    const { registry, backends } = fakeRegistry(standardCapabilities(), { responder: echo });
    await executor(
      [
        {
          kind: 'generate',
          name: 'answer',
          categoryHint: 'reasoning',
          promptTemplate: 'Q: {question}\n{input}',
          systemInstruction: 'Cite articles.',
          temperature: 0.3,
          maxOutputTokens: 300,
        },
      ],
      registry
    ).execute('Article 1.', { question: 'Term?' });

    const [call] = backends.get('deep')?.calls ?? [];
    expect(call.prompt).toBe('Q: Term?\nArticle 1.');
    expect(call.systemInstruction).toBe('Cite articles.');
    expect(call.options).toMatchObject({ temperature: 0.3, maxOutputTokens: 300 });
    expect(call.options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('rejects missing template variables before running anything', async () => {
    const { registry, backends } = fakeRegistry();
    const subject = executor(
      [
        { kind: 'generate', name: 'one', promptTemplate: '{input}' },
        { kind: 'generate', name: 'two', promptTemplate: '{question} {input}' },
      ],
      registry
    );

    await expect(subject.execute('x')).rejects.toThrow(
      new PipelineConfigurationError('Missing template variables: stage "two" uses {question}')
    );
    expect(backends.get('fast')?.calls).toHaveLength(0);
    expect(subject.history()).toEqual([]);
  });

  it('rejects duplicate stage names at construction', () => {
    const { registry } = fakeRegistry();
    expect(() =>
      executor(
        [
          { kind: 'generate', name: 'same', promptTemplate: '{input}' },
          { kind: 'transform', name: 'same', transform: (input) => input },
        ],
        registry
      )
    ).toThrow('Duplicate stage name "same"');
  });

  it('rejects an empty stage list', () => {
    const { registry } = fakeRegistry();
    expect(() => executor([], registry)).toThrow(PipelineConfigurationError);
  });

  it('runs transform stages locally', async () => {
    const { registry, backends } = fakeRegistry(standardCapabilities(), { responder: echo });
    const run = await executor(
      [
        { kind: 'transform', name: 'trim', transform: (input) => input.trim() },
        { kind: 'generate', name: 'ask', promptTemplate: 'ask {input}' },
        { kind: 'transform', name: 'upper', transform: async (input, vars) => `${vars.prefix}${input.toUpperCase()}` },
      ],
      registry
    ).execute('  law  ', { prefix: '> ' });

    expect(run.output).toBe('> <ASK LAW>');
    expect(run.records[0]).toMatchObject({ backendId: null, category: null, estimatedTokens: 0, inputSize: 7 });
    expect(backends.get('fast')?.calls).toHaveLength(1);
  });

  it('records a failing transform', async () => {
    const { registry } = fakeRegistry();
    const run = await executor(
      [
        {
          kind: 'transform',
          name: 'parse',
          transform: () => {
            throw new Error('not JSON');
          },
        },
      ],
      registry
    ).execute('x');

    expect(run).toMatchObject({ status: 'failed', failedStageIndex: 0 });
    expect(run.records[0].errorDetail).toBe('Error: not JSON');
  });

  it('records a routing failure when no backend is available', async () => {
    const { registry } = fakeRegistry(standardCapabilities(), { unavailable: ['fast', 'deep', 'wide'] });
    const run = await executor([{ kind: 'generate', name: 'only', promptTemplate: '{input}' }], registry).execute('x');

    expect(run.status).toBe('failed');
    expect(run.records[0]).toMatchObject({ backendId: null, category: null, success: false });
    expect(run.records[0].errorDetail).toMatch(/^NoBackendAvailableError: /);
  });

  describe('cancellation', () => {
    it('stops before the next stage once the signal aborts', async () => {
      const { registry, backends } = fakeRegistry();
      const controller = new AbortController();
      const run = await executor(
        [
          {
            kind: 'transform',
            name: 'first',
            transform: (input) => {
              controller.abort();
              return input;
            },
          },
          { kind: 'generate', name: 'second', promptTemplate: '{input}' },
        ],
        registry
      ).execute('x', {}, { signal: controller.signal });

      expect(run).toMatchObject({ status: 'cancelled', failedStageIndex: null, output: null });
      expect(run.records).toHaveLength(1);
      expect(backends.get('fast')?.calls).toHaveLength(0);
    });

    it('aborts the in-flight backend call', async () => {
      const controller = new AbortController();
      const pending = executor(
        [{ kind: 'generate', name: 'slow-stage', promptTemplate: '{input}' }],
        hangingRegistry()
      ).execute('x', {}, { signal: controller.signal });

      setTimeout(() => controller.abort(), 10);
      const run = await pending;

      expect(run.status).toBe('cancelled');
      expect(run.records).toEqual([]);
    });
  });

  it('fails a stage that exceeds its time limit', async () => {
    const run = await executor(
      [{ kind: 'generate', name: 'slow-stage', promptTemplate: '{input}', timeoutMs: 20 }],
      hangingRegistry()
    ).execute('x');

    expect(run.status).toBe('failed');
    expect(run.records[0].errorDetail).toBe('StageTimeoutError: Stage "slow-stage" timed out after 20ms');
  });

  it('keeps a bounded history of runs', async () => {
    const { registry } = fakeRegistry();
    const subject = executor([{ kind: 'generate', name: 'only', promptTemplate: '{input}' }], registry, {
      name: 'bounded',
      historyCapacity: 2,
    });

    const runs = [await subject.execute('a'), await subject.execute('b'), await subject.execute('c')];

    expect(subject.history().map((run) => run.runId)).toEqual([runs[1].runId, runs[2].runId]);
    expect(subject.history(1).map((run) => run.runId)).toEqual([runs[2].runId]);
    expect(runs[0].pipelineName).toBe('bounded');

    subject.clearHistory();
    expect(subject.history()).toEqual([]);
  });

  describe('presets', () => {
    it('loads every bundled pipeline', () => {
      for (const preset of PIPELINE_PRESETS) {
        expect(loadPipeline(preset).name).toBe(preset);
      }
    });

    it('routes the legal-analysis stages by their hints', async () => {
      const { registry } = fakeRegistry(standardCapabilities(), { responder: () => 'findings' });
      const definition = loadPipeline('legal-analysis');
      const run = await executor(definition.stages, registry, { name: definition.name }).execute('Статья 1. Текст.');

      expect(run.status).toBe('completed');
      expect(run.records.map((record) => [record.stageName, record.category, record.backendId])).toEqual([
        ['document_processing', 'large-document', 'fast'],
        ['analysis', 'reasoning', 'deep'],
        ['summarization', 'quick', 'fast'],
      ]);
    });

    it('requires the question variable for document-qa', async () => {
      const { registry } = fakeRegistry();
      const subject = executor(loadPipeline('document-qa').stages, registry);

      await expect(subject.execute('text')).rejects.toBeInstanceOf(PipelineConfigurationError);
      await expect(subject.execute('text', { question: 'Term?' })).resolves.toMatchObject({ status: 'completed' });
    });

    it('rejects malformed definitions', () => {
      expect(() => parsePipelineDefinition({ name: 'broken', stages: [{ kind: 'generate', name: 'a' }] })).toThrow(
        PipelineConfigurationError
      );
      expect(() => loadPipeline('no-such-pipeline')).toThrow('Pipeline definition not found');
    });
  });
});
