import { assertIntentKind } from '../../domain/intents/IntentKind.js';
import type { AddressFields, ParseResult, StructuredResult } from '../../types/intent.types.js';
import { parseAddress } from './parsers/address-parser.js';
import { parseDetailedIntent } from './parsers/detailed-intent-parser.js';

export function postprocess(kind: string, rawOutput: string): ParseResult {
  switch (assertIntentKind(kind)) {
    case 'address':
      return parseAddress(rawOutput);
    case 'detailed_intent':
      return parseDetailedIntent(rawOutput);
  }
}

export function hasAddress(result: StructuredResult): result is StructuredResult & { address: AddressFields } {
  return result.address !== undefined && Object.keys(result.address).length > 0;
}
