import OpenAI from 'openai';

export interface OpenAIClientOptions {
  baseURL?: string;
  timeout: number;
  maxRetries: number;
}

/** One SDK client per API key, created on first use. */
export class OpenAIClientFactory {
  private clients = new Map<string, OpenAI>();

  constructor(private options: OpenAIClientOptions) {}

  getClient(apiKey: string): OpenAI {
    const existing = this.clients.get(apiKey);
    if (existing) {
      return existing;
    }

    const client = new OpenAI({
      apiKey,
      baseURL: this.options.baseURL,
      timeout: this.options.timeout,
      maxRetries: this.options.maxRetries,
    });
    this.clients.set(apiKey, client);
    return client;
  }

  reset(): void {
    this.clients.clear();
  }
}
