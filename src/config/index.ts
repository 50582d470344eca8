import 'dotenv/config';
import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

export type { Config } from './validation.js';

function int(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function list(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: env.NODE_ENV || undefined,
      port: int(env.PORT),
      host: env.HOST || undefined,
      logLevel: env.LOG_LEVEL || undefined,
    },
    auth: {
      apiToken: env.RESOLVER_API_KEY || '',
    },
    llm: {
      apiKeys: list(env.OPENAI_API_KEYS),
      baseURL: env.OPENAI_BASE_URL || undefined,
      engine: env.LLM_ENGINE || '',
      timeoutMs: int(env.LLM_TIMEOUT_MS),
      maxRetries: int(env.LLM_MAX_RETRIES),
    },
    tokenizer: {
      encoding: env.TOKENIZER_ENCODING || undefined,
      modelMaxTokens: int(env.MODEL_MAX_TOKENS),
    },
    prompts: {
      addressFile: env.ADDRESS_PROMPT_FILE || undefined,
      detailedIntentFile: env.DETAILED_INTENT_PROMPT_FILE || undefined,
      addressMaxTokens: int(env.ADDRESS_MAX_TOKENS),
      detailedIntentMaxTokens: int(env.DETAILED_INTENT_MAX_TOKENS),
    },
    geo: {
      enabled: env.GEO_LOCATION === 'true',
      apiKey: env.GEOCODING_API_KEY || undefined,
      timeoutMs: int(env.GEO_TIMEOUT_MS),
    },
    workers: {
      count: int(env.NUM_WORKERS),
      index: int(env.WORKER_INDEX),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError('Invalid configuration', issues);
    }
    throw error;
  }
}
