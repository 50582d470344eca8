import type { AddressFields, GeoLocation } from '../../types/intent.types.js';

export interface Geocoder {
  /** Resolves to `null` when the address has no match. */
  lookup(address: AddressFields): Promise<GeoLocation | null>;
}
