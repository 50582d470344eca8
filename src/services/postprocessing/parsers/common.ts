import { STOP_SEQUENCE } from '../../../domain/intents/GenerationConfig.js';

const EMPTY_VALUES = new Set(['', 'none', 'n/a', 'na', '-', 'null']);

export function isEmptyValue(value: string): boolean {
  return EMPTY_VALUES.has(value.trim().toLowerCase());
}

/** Drops anything after the stop marker, in case the model echoed it. */
export function stripStopSequence(rawOutput: string): string {
  const end = rawOutput.indexOf(STOP_SEQUENCE);
  return end === -1 ? rawOutput : rawOutput.slice(0, end);
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
}

export function parseList(value: string): string[] {
  const items: string[] = [];
  for (const part of value.split(',')) {
    const item = part.trim().toLowerCase();
    if (!isEmptyValue(item) && !items.includes(item)) {
      items.push(item);
    }
  }
  return items;
}
