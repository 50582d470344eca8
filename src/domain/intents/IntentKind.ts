import { ConfigurationError } from '../../utils/errors.js';

export const INTENT_KINDS = ['address', 'detailed_intent'] as const;

export type IntentKind = (typeof INTENT_KINDS)[number];

export function isIntentKind(value: unknown): value is IntentKind {
  return INTENT_KINDS.some(kind => kind === value);
}

export function assertIntentKind(value: unknown): IntentKind {
  if (!isIntentKind(value)) {
    throw new ConfigurationError('Unknown information extraction requested', { kind: value });
  }
  return value;
}
