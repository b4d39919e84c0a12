import { describe, it, expect } from 'vitest';
import { AuthenticationError, NoBackendAvailableError, ProviderError } from '../utils/errors.js';
import { FakeBackend, fakeRegistry, standardCapabilities, testClassificationConfig } from '../__tests__/fakes.js';
import type { BackendRegistry } from './BackendRegistry.js';
import { BackendRouter } from './BackendRouter.js';
import { RoutedInvoker } from './RoutedInvoker.js';
import { TaskClassifier } from './TaskClassifier.js';

function invokerFor(registry: BackendRegistry): RoutedInvoker {
  return new RoutedInvoker(registry, new BackendRouter(registry, new TaskClassifier(testClassificationConfig)));
}

describe('RoutedInvoker', () => {
  it('invokes the routed backend with the prompt and options', async () => {
    const { registry, backends } = fakeRegistry(standardCapabilities(), { responder: () => 'answer' });
    const invoker = invokerFor(registry);

    const result = await invoker.invoke({
      prompt: 'Why was article 2 repealed?',
      systemInstruction: 'Be precise.',
      options: { temperature: 0.1 },
    });

    expect(result.output).toBe('answer');
    expect(result.profile.chosenBackend).toBe('deep');
    expect(backends.get('deep')?.calls).toEqual([
      { prompt: 'Why was article 2 repealed?', systemInstruction: 'Be precise.', options: { temperature: 0.1 } },
    ]);
  });

  it('plans without invoking', () => {
    const { registry, backends } = fakeRegistry();
    const profile = invokerFor(registry).plan({ prompt: 'What is a decree?' });

    expect(profile.chosenBackend).toBe('fast');
    expect(backends.get('fast')?.calls).toHaveLength(0);
  });

  it('disables a backend that fails authentication and reroutes later calls', async () => {
    const { registry } = fakeRegistry();
    registry.register(
      standardCapabilities()[1],
      new FakeBackend('deep', () => {
        throw new AuthenticationError('invalid key', 'deep');
      })
    );
    const invoker = invokerFor(registry);

    await expect(invoker.invoke({ prompt: 'Why?' })).rejects.toBeInstanceOf(AuthenticationError);
    expect(registry.isAvailable('deep')).toBe(false);

    const next = await invoker.invoke({ prompt: 'Why?' });
    expect(next.profile).toMatchObject({ chosenBackend: 'fast', fallback: true });
  });

  it('keeps a backend available after other failures', async () => {
    const { registry } = fakeRegistry();
    registry.register(
      standardCapabilities()[0],
      new FakeBackend('fast', () => {
        throw new ProviderError('overloaded', 'fast');
      })
    );

    await expect(invokerFor(registry).invoke({ prompt: 'What is a decree?' })).rejects.toThrow('overloaded');
    expect(registry.isAvailable('fast')).toBe(true);
  });

  it('rejects a profile naming an unregistered backend', async () => {
    const { registry } = fakeRegistry();
    const invoker = invokerFor(registry);
    const profile = { ...invoker.plan({ prompt: 'x' }), chosenBackend: 'ghost' };

    await expect(invoker.invoke({ prompt: 'x' }, profile)).rejects.toBeInstanceOf(NoBackendAvailableError);
  });
});
