import { logger } from '../../utils/logger.js';
import { UpstreamError } from '../../utils/errors.js';
import type { GenerationConfig } from '../../domain/intents/GenerationConfig.js';
import type { CompletionService } from './CompletionService.interface.js';
import type OpenAI from 'openai';

/** The part of the `openai` client this service calls. */
export interface CompletionClientProvider {
  getClient(apiKey: string): {
    completions: {
      create(body: OpenAI.CompletionCreateParamsNonStreaming): Promise<OpenAI.Completion>;
    };
  };
}

export class OpenAICompletionService implements CompletionService {
  constructor(
    private clients: CompletionClientProvider,
    private engine: string
  ) {}

  async complete(prompts: string[], apiKey: string, generation: GenerationConfig): Promise<string[]> {
    if (prompts.length === 0) {
      return [];
    }

    try {
      logger.debug(
        { engine: this.engine, prompts: prompts.length, maxTokens: generation.maxTokens },
        'Sending completion batch'
      );

      const startTime = Date.now();
      const completion = await this.clients.getClient(apiKey).completions.create({
        model: this.engine,
        prompt: prompts,
        n: 1,
        max_tokens: generation.maxTokens,
        temperature: generation.temperature,
        top_p: generation.topP,
        frequency_penalty: generation.frequencyPenalty,
        presence_penalty: generation.presencePenalty,
        stop: generation.stop,
      });

      logger.debug(
        { duration: `${Date.now() - startTime}ms`, tokensUsed: completion.usage?.total_tokens },
        'Received completion batch'
      );

      const outputs = new Map<number, string>();
      for (const choice of completion.choices) {
        outputs.set(choice.index, choice.text);
      }

      return prompts.map((_, index) => {
        const text = outputs.get(index);
        if (text === undefined) {
          throw new UpstreamError('Completion response is missing a choice', {
            index,
            expected: prompts.length,
            received: completion.choices.length,
          });
        }
        return text;
      });
    } catch (error) {
      logger.error({ error, engine: this.engine, prompts: prompts.length }, 'Completion request failed');
      if (error instanceof UpstreamError) {
        throw error;
      }
      throw new UpstreamError(
        `Completion request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error
      );
    }
  }
}
