import { z } from 'zod';

export const configSchema = z
  .object({
    server: z.object({
      nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
      port: z.number().int().positive().default(3000),
      host: z.string().min(1).default('0.0.0.0'),
      logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    }),
    auth: z.object({
      apiToken: z.string().min(1, 'RESOLVER_API_KEY is required'),
    }),
    llm: z.object({
      apiKeys: z.array(z.string().min(1)).min(1, 'OPENAI_API_KEYS must list at least one key'),
      baseURL: z.string().url().optional(),
      engine: z.string().min(1, 'LLM_ENGINE is required'),
      timeoutMs: z.number().int().positive().default(60_000),
      maxRetries: z.number().int().min(0).default(2),
    }),
    tokenizer: z.object({
      encoding: z.enum(['gpt2', 'r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base']).default('p50k_base'),
      modelMaxTokens: z.number().int().positive().default(4097),
    }),
    prompts: z.object({
      addressFile: z.string().min(1).default('prompts/address.txt'),
      detailedIntentFile: z.string().min(1).default('prompts/detailed_intent.txt'),
      addressMaxTokens: z.number().int().positive().default(128),
      detailedIntentMaxTokens: z.number().int().positive().default(64),
    }),
    geo: z.object({
      enabled: z.boolean().default(false),
      apiKey: z.string().optional(),
      timeoutMs: z.number().int().positive().default(10_000),
    }),
    workers: z.object({
      count: z.number().int().positive().default(1),
      index: z.number().int().min(0).optional(),
    }),
  })
  .superRefine((value, ctx) => {
    if (value.geo.enabled && !value.geo.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['geo', 'apiKey'],
        message: 'GEOCODING_API_KEY is required when GEO_LOCATION is enabled',
      });
    }
    if (value.workers.index !== undefined && value.workers.index >= value.workers.count) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['workers', 'index'],
        message: 'WORKER_INDEX must be lower than NUM_WORKERS',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
