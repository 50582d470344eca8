export const ADDRESS_FIELDS = [
  'street',
  'neighborhood',
  'district',
  'city',
  'province',
  'postcode',
  'country',
] as const;

export type AddressField = (typeof ADDRESS_FIELDS)[number];

export type AddressFields = Partial<Record<AddressField, string>>;

export interface GeoLocation {
  latitude: number;
  longitude: number;
  formattedAddress: string;
}

export interface StructuredResult {
  intent: string[];
  detailed_intent_tags: string[];
  address?: AddressFields;
  geo?: GeoLocation;
}

export type ParseResult =
  | { ok: true; value: StructuredResult }
  | { ok: false; reason: string };

export interface ExtractionResult {
  string: string;
  processed: StructuredResult;
}

export function emptyResult(): StructuredResult {
  return { intent: [], detailed_intent_tags: [] };
}
