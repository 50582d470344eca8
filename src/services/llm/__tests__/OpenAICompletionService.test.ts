import { describe, it, expect, vi } from 'vitest';
import type OpenAI from 'openai';
import { OpenAICompletionService, type CompletionClientProvider } from '../OpenAICompletionService.js';
import { createGenerationConfigs } from '../../../domain/intents/GenerationConfig.js';
import { UpstreamError } from '../../../utils/errors.js';

const generation = createGenerationConfigs({ addressMaxTokens: 128, detailedIntentMaxTokens: 64 }).address;

function completion(choices: Array<{ index: number; text: string }>): OpenAI.Completion {
  return {
    id: 'cmpl-test',
    object: 'text_completion',
    created: 0,
    model: 'test-engine',
    choices: choices.map(choice => ({ ...choice, finish_reason: 'stop' as const, logprobs: null })),
  };
}

function providerReturning(create: (body: OpenAI.CompletionCreateParamsNonStreaming) => Promise<OpenAI.Completion>) {
  const createMock = vi.fn(create);
  const getClient = vi.fn((_apiKey: string) => ({ completions: { create: createMock } }));
  const provider: CompletionClientProvider = { getClient };
  return { provider, getClient, createMock };
}

describe('OpenAICompletionService', () => {
  it('sends all prompts in one call with the sampling parameters', async () => {
    const { provider, getClient, createMock } = providerReturning(async () =>
      completion([
        { index: 0, text: 'first' },
        { index: 1, text: 'second' },
      ])
    );
    const service = new OpenAICompletionService(provider, 'test-engine');

    const outputs = await service.complete(['p1', 'p2'], 'key-1', generation);

    expect(outputs).toEqual(['first', 'second']);
    expect(getClient).toHaveBeenCalledWith('key-1');
    expect(createMock).toHaveBeenCalledTimes(1);
    expect(createMock).toHaveBeenCalledWith({
      model: 'test-engine',
      prompt: ['p1', 'p2'],
      n: 1,
      max_tokens: 128,
      temperature: 0.1,
      top_p: 1,
      frequency_penalty: 0.3,
      presence_penalty: 0,
      stop: '#END',
    });
  });

  it('orders outputs by choice index', async () => {
    const { provider } = providerReturning(async () =>
      completion([
        { index: 1, text: 'second' },
        { index: 0, text: 'first' },
      ])
    );
    const service = new OpenAICompletionService(provider, 'test-engine');

    await expect(service.complete(['p1', 'p2'], 'key-1', generation)).resolves.toEqual(['first', 'second']);
  });

  it('fails when a choice is missing', async () => {
    const { provider } = providerReturning(async () => completion([{ index: 0, text: 'first' }]));
    const service = new OpenAICompletionService(provider, 'test-engine');

    await expect(service.complete(['p1', 'p2'], 'key-1', generation)).rejects.toThrow(
      'Completion response is missing a choice'
    );
  });

  it('wraps client failures in an UpstreamError', async () => {
    const { provider } = providerReturning(async () => {
      throw new Error('429 rate limited');
    });
    const service = new OpenAICompletionService(provider, 'test-engine');

    const result = service.complete(['p1'], 'key-1', generation);
    await expect(result).rejects.toBeInstanceOf(UpstreamError);
    await expect(result).rejects.toThrow('Completion request failed: 429 rate limited');
  });

  it('does not call the endpoint for an empty batch', async () => {
    const { provider, createMock } = providerReturning(async () => completion([]));
    const service = new OpenAICompletionService(provider, 'test-engine');

    await expect(service.complete([], 'key-1', generation)).resolves.toEqual([]);
    expect(createMock).not.toHaveBeenCalled();
  });
});
