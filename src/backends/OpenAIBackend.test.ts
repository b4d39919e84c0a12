import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'timers/promises';
import { AuthenticationError } from '../utils/errors.js';
import { OpenAIBackend } from './OpenAIBackend.js';
import type { OpenAIResponsesClient } from './OpenAIBackend.js';

type ResponsesBody = Parameters<OpenAIResponsesClient['responses']['create']>[0];

function fakeClient(respond: (body: ResponsesBody, call: number) => Promise<string>) {
  const requests: ResponsesBody[] = [];
  const client: OpenAIResponsesClient = {
    responses: {
      create: async (body) => {
        requests.push(body);
        const output_text = await respond(body, requests.length);
        return { output_text, usage: { input_tokens: 1, output_tokens: 1 } };
      },
    },
  };
  return { client, requests };
}

describe('OpenAIBackend', () => {
  it('sends the prompt as input and returns the output text', async () => {
    const { client, requests } = fakeClient(async () => 'Two obligations found.');
    const backend = new OpenAIBackend('openai', 'gpt-test', {}, client);

    const output = await backend.invoke('List obligations', 'You are a legal analyst.', {
      temperature: 0.2,
      maxOutputTokens: 500,
    });

    expect(output).toBe('Two obligations found.');
    expect(requests).toEqual([
      {
        model: 'gpt-test',
        input: 'List obligations',
        instructions: 'You are a legal analyst.',
        temperature: 0.2,
        max_output_tokens: 500,
      },
    ]);
  });

  it('omits unset options', async () => {
    const { client, requests } = fakeClient(async () => 'ok');
    await new OpenAIBackend('openai', 'gpt-test', {}, client).invoke('Hi', undefined);

    expect(requests).toEqual([{ model: 'gpt-test', input: 'Hi' }]);
  });

  it('retries rate-limited requests', async () => {
    const { client, requests } = fakeClient(async (_body, call) => {
      if (call === 1) {
        throw Object.assign(new Error('Rate limit reached'), { status: 429, headers: { 'retry-after': '0' } });
      }
      return 'second try';
    });

    await expect(new OpenAIBackend('openai', 'gpt-test', {}, client).invoke('Hi', undefined)).resolves.toBe(
      'second try'
    );
    expect(requests).toHaveLength(2);
  });

  it('surfaces authentication failures without retrying', async () => {
    const { client, requests } = fakeClient(async () => {
      throw Object.assign(new Error('Incorrect API key'), { status: 401 });
    });

    await expect(new OpenAIBackend('openai', 'gpt-test', {}, client).invoke('Hi', undefined)).rejects.toBeInstanceOf(
      AuthenticationError
    );
    expect(requests).toHaveLength(1);
  });

  it('limits concurrent calls', async () => {
    let active = 0;
    let peak = 0;
    const { client } = fakeClient(async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
      return 'ok';
    });
    const backend = new OpenAIBackend('openai', 'gpt-test', { maxConcurrentApiCalls: 2 }, client);

    await Promise.all(Array.from({ length: 6 }, (_, i) => backend.invoke(`prompt ${i}`, undefined)));

    expect(peak).toBe(2);
  });
});
