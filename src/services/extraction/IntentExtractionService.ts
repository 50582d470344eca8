import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import { INTENT_KINDS, assertIntentKind, type IntentKind } from '../../domain/intents/IntentKind.js';
import { getGenerationConfig, type GenerationConfigTable } from '../../domain/intents/GenerationConfig.js';
import { emptyResult, type ExtractionResult, type StructuredResult } from '../../types/intent.types.js';
import type { PromptBuilder } from '../prompt/PromptBuilder.js';
import type { TemplateStore } from '../prompt/TemplateStore.js';
import type { Tokenizer } from '../prompt/Tokenizer.interface.js';
import type { CompletionService } from '../llm/CompletionService.interface.js';
import type { Geocoder } from '../geo/Geocoder.interface.js';
import { hasAddress, postprocess } from '../postprocessing/OutputPostprocessor.js';

export interface IntentExtractionDeps {
  templates: TemplateStore;
  tokenizer: Tokenizer;
  promptBuilder: PromptBuilder;
  generation: GenerationConfigTable;
  completions: CompletionService;
  /** Set only when geo-location is enabled. */
  geocoder?: Geocoder;
}

export class IntentExtractionService {
  constructor(private deps: IntentExtractionDeps) {
    for (const kind of INTENT_KINDS) {
      const templateTokens = deps.tokenizer.countTokens(deps.templates.get(kind));
      const reserved = deps.generation[kind].maxTokens;
      if (templateTokens + reserved > deps.tokenizer.maxTokens) {
        throw new ConfigurationError(
          `Template for "${kind}" (${templateTokens} tokens) plus ${reserved} output tokens exceeds the ${deps.tokenizer.maxTokens} token context`
        );
      }
    }
  }

  async extract(kind: string, inputs: string[], apiKey: string): Promise<ExtractionResult[]> {
    const intentKind = assertIntentKind(kind);
    const template = this.deps.templates.get(intentKind);
    const generation = getGenerationConfig(this.deps.generation, intentKind);

    if (inputs.length === 0) {
      return [];
    }

    const prompts = inputs.map(text =>
      this.deps.promptBuilder.buildPrompt(text, template, generation.maxTokens)
    );

    const outputs = await this.deps.completions.complete(prompts, apiKey, generation);

    const results: ExtractionResult[] = [];
    for (const output of outputs) {
      const processed = this.process(intentKind, output);
      if (intentKind === 'address') {
        await this.enrichWithGeo(processed);
      }
      results.push({ string: output, processed });
    }

    logger.debug({ kind: intentKind, count: results.length }, 'Extraction complete');
    return results;
  }

  private process(kind: IntentKind, output: string): StructuredResult {
    const parsed = postprocess(kind, output);
    if (parsed.ok) {
      return parsed.value;
    }

    logger.warn({ kind, output, reason: parsed.reason }, 'Parsing error in completion, using empty result');
    return emptyResult();
  }

  private async enrichWithGeo(result: StructuredResult): Promise<void> {
    const geocoder = this.deps.geocoder;
    if (!geocoder || !hasAddress(result)) {
      return;
    }

    try {
      const geo = await geocoder.lookup(result.address);
      if (geo) {
        result.geo = geo;
      }
    } catch (error) {
      logger.warn({ error, address: result.address }, 'Geocoding failed, returning result without geo');
    }
  }
}
