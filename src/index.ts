import { loadConfig, type Config } from './config/index.js';
import { logger } from './utils/logger.js';
import { ConfigurationError } from './utils/errors.js';
import { createGenerationConfigs } from './domain/intents/GenerationConfig.js';
import { TemplateStore } from './services/prompt/TemplateStore.js';
import { TiktokenTokenizer } from './services/prompt/TiktokenTokenizer.js';
import { PromptBuilder } from './services/prompt/PromptBuilder.js';
import { KeyRotator, partitionKeys } from './services/llm/KeyRotator.js';
import { OpenAIClientFactory } from './services/llm/OpenAIClientFactory.js';
import { OpenAICompletionService } from './services/llm/OpenAICompletionService.js';
import { GoogleGeocoder } from './services/geo/GoogleGeocoder.js';
import { IntentExtractionService } from './services/extraction/IntentExtractionService.js';
import { buildApp } from './app.js';

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError && Array.isArray(error.details)) {
      console.error('\n❌ Invalid configuration:\n');
      error.details.forEach(issue => console.error(`  ${String(issue)}`));
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

const config = readConfig();
if (config.server.logLevel) {
  logger.level = config.server.logLevel;
}

logger.info('Initializing services...');

const tokenizer = new TiktokenTokenizer(config.tokenizer.modelMaxTokens, config.tokenizer.encoding);

const templates = await TemplateStore.load({
  address: config.prompts.addressFile,
  detailed_intent: config.prompts.detailedIntentFile,
});

const workerIndex = config.workers.index ?? process.pid % config.workers.count;
const rotator = new KeyRotator(partitionKeys(config.llm.apiKeys, config.workers.count, workerIndex));

const completions = new OpenAICompletionService(
  new OpenAIClientFactory({
    baseURL: config.llm.baseURL,
    timeout: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
  }),
  config.llm.engine
);

const geocoder =
  config.geo.enabled && config.geo.apiKey
    ? new GoogleGeocoder(config.geo.apiKey, config.geo.timeoutMs)
    : undefined;

const extraction = new IntentExtractionService({
  templates,
  tokenizer,
  promptBuilder: new PromptBuilder(tokenizer),
  generation: createGenerationConfigs(config.prompts),
  completions,
  geocoder,
});

logger.warn(`Engine ${config.llm.engine}`);
logger.info({ workerIndex, keys: rotator.size, geoLocation: geocoder !== undefined }, 'Services initialized');

const fastify = await buildApp({ extraction, rotator, apiToken: config.auth.apiToken });

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  tokenizer.dispose();
  logger.info('Shutdown complete');
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

try {
  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}
