export interface Tokenizer {
  /** Context size of the model, prompt and completion together. */
  readonly maxTokens: number;
  countTokens(text: string): number;
  /** Keeps the earliest `maxTokens` tokens. A budget of zero or less yields `''`. */
  truncate(text: string, maxTokens: number): string;
}
