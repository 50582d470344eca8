import { logger } from '../../utils/logger.js';
import { sanitize } from '../preprocessing/TextSanitizer.js';
import { fillTemplate } from './TemplateStore.js';
import type { Tokenizer } from './Tokenizer.interface.js';

export class PromptBuilder {
  constructor(private tokenizer: Tokenizer) {}

  /**
   * Fits a tweet into `template` so that the prompt plus `reservedOutputTokens`
   * stays within the model context. When the template and the reserved output
   * already use the whole context, the input is dropped and the template is
   * sent with an empty insertion.
   */
  buildPrompt(text: string, template: string, reservedOutputTokens: number): string {
    const templateTokens = this.tokenizer.countTokens(template);
    const sanitized = sanitize(text);
    const budget = this.tokenizer.maxTokens - reservedOutputTokens - templateTokens;

    if (budget <= 0) {
      logger.warn(
        { budget, templateTokens, reservedOutputTokens, maxTokens: this.tokenizer.maxTokens },
        'No token budget left for input, sending template only'
      );
    }

    return fillTemplate(template, this.tokenizer.truncate(sanitized, budget));
  }
}
