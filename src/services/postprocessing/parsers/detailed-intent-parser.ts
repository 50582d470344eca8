import type { ParseResult } from '../../../types/intent.types.js';
import { parseList, splitLines, stripStopSequence } from './common.js';

const INTENT_LINE = /^intents?\s*:(.*)$/i;
const TAGS_LINE = /^detailed[\s_-]*intent[\s_-]*tags?\s*:(.*)$/i;

/**
 * Expected completion:
 *
 *   Intent: request, offer
 *   Detailed Intent Tags: rescue, food
 */
export function parseDetailedIntent(rawOutput: string): ParseResult {
  let intent: string[] | undefined;
  let tags: string[] | undefined;

  for (const line of splitLines(stripStopSequence(rawOutput))) {
    const intentMatch = INTENT_LINE.exec(line);
    if (intentMatch && intent === undefined) {
      intent = parseList(intentMatch[1] ?? '');
      continue;
    }

    const tagsMatch = TAGS_LINE.exec(line);
    if (tagsMatch && tags === undefined) {
      tags = parseList(tagsMatch[1] ?? '');
    }
  }

  if (intent === undefined) {
    return { ok: false, reason: 'missing "Intent:" line' };
  }

  return { ok: true, value: { intent, detailed_intent_tags: tags ?? [] } };
}
