import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { UpstreamError } from '../../utils/errors.js';
import { ADDRESS_FIELDS, type AddressFields, type GeoLocation } from '../../types/intent.types.js';
import type { Geocoder } from './Geocoder.interface.js';

const GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

const geocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(
    z.object({
      formatted_address: z.string(),
      geometry: z.object({
        location: z.object({
          lat: z.number(),
          lng: z.number(),
        }),
      }),
    })
  ),
});

export function formatAddress(address: AddressFields): string {
  return ADDRESS_FIELDS.map(field => address[field])
    .filter((value): value is string => value !== undefined && value.length > 0)
    .join(', ');
}

export class GoogleGeocoder implements Geocoder {
  constructor(
    private apiKey: string,
    private timeoutMs = 10_000,
    private endpoint = GEOCODE_URL
  ) {}

  async lookup(address: AddressFields): Promise<GeoLocation | null> {
    const query = formatAddress(address);
    if (!query) {
      return null;
    }

    const url = new URL(this.endpoint);
    url.searchParams.set('address', query);
    url.searchParams.set('key', this.apiKey);

    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        throw new UpstreamError(`Geocoding request failed with HTTP ${response.status}`);
      }

      const body = geocodeResponseSchema.parse(await response.json());

      if (body.status === 'ZERO_RESULTS') {
        logger.debug({ query }, 'Geocoding returned no results');
        return null;
      }

      if (body.status !== 'OK') {
        throw new UpstreamError(`Geocoding failed with status ${body.status}`, body.error_message);
      }

      const [best] = body.results;
      if (!best) {
        return null;
      }

      return {
        latitude: best.geometry.location.lat,
        longitude: best.geometry.location.lng,
        formattedAddress: best.formatted_address,
      };
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      throw new UpstreamError(
        `Geocoding request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error
      );
    }
  }
}
