import { INTENT_KINDS } from '../../domain/intents/IntentKind.js';
import { ADDRESS_FIELDS } from '../../types/intent.types.js';

export const intentRequestSchema = {
  type: 'object',
  required: ['inputs'],
  properties: {
    inputs: { type: 'array', items: { type: 'string' } },
    kind: { type: 'string', enum: [...INTENT_KINDS] },
  },
} as const;

const addressSchema = {
  type: 'object',
  properties: Object.fromEntries(ADDRESS_FIELDS.map(field => [field, { type: 'string' }])),
};

const geoSchema = {
  type: 'object',
  properties: {
    latitude: { type: 'number' },
    longitude: { type: 'number' },
    formattedAddress: { type: 'string' },
  },
} as const;

export const intentResponseSchema = {
  type: 'object',
  properties: {
    response: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          string: { type: 'string' },
          processed: {
            type: 'object',
            properties: {
              intent: { type: 'array', items: { type: 'string' } },
              detailed_intent_tags: { type: 'array', items: { type: 'string' } },
              address: addressSchema,
              geo: geoSchema,
            },
          },
        },
      },
    },
  },
} as const;

export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
  },
} as const;
