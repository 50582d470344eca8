import type { GenerationConfig } from '../../domain/intents/GenerationConfig.js';

export interface CompletionService {
  /** Returns one completion text per prompt, in prompt order. */
  complete(prompts: string[], apiKey: string, generation: GenerationConfig): Promise<string[]>;
}
