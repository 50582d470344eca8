import { readFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import { assertIntentKind, type IntentKind } from '../../domain/intents/IntentKind.js';

export const INPUT_PLACEHOLDER = '{ocr_input}';

export type TemplateFiles = Record<IntentKind, string>;

function countPlaceholders(template: string): number {
  return template.split(INPUT_PLACEHOLDER).length - 1;
}

export class TemplateStore {
  private templates: Readonly<Record<IntentKind, string>>;

  constructor(templates: Record<IntentKind, string>) {
    for (const [kind, template] of Object.entries(templates)) {
      const placeholders = countPlaceholders(template);
      if (placeholders !== 1) {
        throw new ConfigurationError(
          `Template for "${kind}" must contain exactly one ${INPUT_PLACEHOLDER}, found ${placeholders}`
        );
      }
    }
    this.templates = Object.freeze({ ...templates });
  }

  static async load(files: TemplateFiles): Promise<TemplateStore> {
    const read = async (kind: IntentKind, path: string): Promise<string> => {
      try {
        return await readFile(path, 'utf-8');
      } catch (error) {
        throw new ConfigurationError(`Cannot read ${kind} prompt template at ${path}`, error);
      }
    };

    const store = new TemplateStore({
      address: await read('address', files.address),
      detailed_intent: await read('detailed_intent', files.detailed_intent),
    });

    logger.info({ files }, 'Prompt templates loaded');
    return store;
  }

  get(kind: string): string {
    return this.templates[assertIntentKind(kind)];
  }
}

export function fillTemplate(template: string, input: string): string {
  // replacer function keeps `$` sequences in the input literal
  return template.replace(INPUT_PLACEHOLDER, () => input);
}
