import type { AddressField, AddressFields, ParseResult } from '../../../types/intent.types.js';
import { isEmptyValue, splitLines, stripStopSequence } from './common.js';

const FIELD_LINE = /^([a-z][a-z _-]*?)\s*:(.*)$/i;

const LABELS: Record<string, AddressField> = {
  street: 'street',
  'street address': 'street',
  neighborhood: 'neighborhood',
  neighbourhood: 'neighborhood',
  district: 'district',
  city: 'city',
  province: 'province',
  state: 'province',
  postcode: 'postcode',
  'postal code': 'postcode',
  zip: 'postcode',
  'zip code': 'postcode',
  country: 'country',
};

function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[\s_-]+/g, ' ').trim();
}

/**
 * Expected completion, one `Field: value` per line:
 *
 *   Street: 123 Main St
 *   City: Springfield
 *   Country: -
 *
 * Unknown labels are ignored; a completion without any known label fails.
 */
export function parseAddress(rawOutput: string): ParseResult {
  const address: AddressFields = {};
  let recognised = 0;

  for (const line of splitLines(stripStopSequence(rawOutput))) {
    const match = FIELD_LINE.exec(line);
    if (!match) {
      continue;
    }

    const field = LABELS[normalizeLabel(match[1] ?? '')];
    if (!field) {
      continue;
    }

    recognised++;
    const value = (match[2] ?? '').trim();
    if (!isEmptyValue(value) && address[field] === undefined) {
      address[field] = value;
    }
  }

  if (recognised === 0) {
    return { ok: false, reason: 'no address fields found' };
  }

  return { ok: true, value: { intent: ['address'], detailed_intent_tags: [], address } };
}
