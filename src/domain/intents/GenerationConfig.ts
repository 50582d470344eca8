import { assertIntentKind, type IntentKind } from './IntentKind.js';

export const STOP_SEQUENCE = '#END';

/**
 * Sampling parameters sent with every completion call. Fixed per intent
 * kind; only the output token limits come from configuration.
 */
export interface GenerationConfig {
  maxTokens: number;
  temperature: number;
  frequencyPenalty: number;
  presencePenalty: number;
  topP: number;
  stop: string;
}

export interface OutputTokenLimits {
  addressMaxTokens: number;
  detailedIntentMaxTokens: number;
}

export type GenerationConfigTable = Readonly<Record<IntentKind, GenerationConfig>>;

export function createGenerationConfigs(limits: OutputTokenLimits): GenerationConfigTable {
  return Object.freeze({
    address: {
      maxTokens: limits.addressMaxTokens,
      temperature: 0.1,
      frequencyPenalty: 0.3,
      presencePenalty: 0,
      topP: 1,
      stop: STOP_SEQUENCE,
    },
    detailed_intent: {
      maxTokens: limits.detailedIntentMaxTokens,
      temperature: 0,
      frequencyPenalty: 0,
      presencePenalty: 0,
      topP: 1,
      stop: STOP_SEQUENCE,
    },
  });
}

export function getGenerationConfig(table: GenerationConfigTable, kind: string): GenerationConfig {
  return table[assertIntentKind(kind)];
}
