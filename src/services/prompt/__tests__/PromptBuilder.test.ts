import { describe, it, expect } from 'vitest';
import { PromptBuilder } from '../PromptBuilder.js';
import { TiktokenTokenizer, completeUtf8Length } from '../TiktokenTokenizer.js';
import { WordTokenizer } from '../../../__tests__/fakes.js';

const TEMPLATE = 'Tweet: {ocr_input}';

describe('PromptBuilder', () => {
  it('truncates the input to the tokens left after template and output', () => {
    const builder = new PromptBuilder(new WordTokenizer(10));

    // 10 - 4 reserved - 2 template tokens leaves 4 for the input
    expect(builder.buildPrompt('one two three four five six', TEMPLATE, 4)).toBe('Tweet: one two three four');
  });

  it('sanitizes the input before inserting it', () => {
    const builder = new PromptBuilder(new WordTokenizer(100));

    expect(builder.buildPrompt('@bob hi http://x.com/y there', TEMPLATE, 4)).toBe('Tweet:  hi there');
  });

  it('sends the template alone when no budget is left', () => {
    const builder = new PromptBuilder(new WordTokenizer(6));

    expect(builder.buildPrompt('some words here', TEMPLATE, 4)).toBe('Tweet: ');
    expect(builder.buildPrompt('some words here', TEMPLATE, 50)).toBe('Tweet: ');
  });

  it('keeps replacement patterns in the input literal', () => {
    const builder = new PromptBuilder(new WordTokenizer(100));

    expect(builder.buildPrompt("costs $& and $' more", TEMPLATE, 4)).toBe("Tweet: costs $& and $' more");
  });

  it('never exceeds the context size while the template fits', () => {
    const tokenizer = new WordTokenizer(12);
    const builder = new PromptBuilder(tokenizer);
    const text = Array.from({ length: 30 }, (_, i) => `word${i}`).join(' ');

    for (let reserved = 0; reserved <= 10; reserved++) {
      const prompt = builder.buildPrompt(text, TEMPLATE, reserved);
      expect(tokenizer.countTokens(prompt) + reserved).toBeLessThanOrEqual(tokenizer.maxTokens);
    }
  });

  it('stays within the context with a real tokenizer', () => {
    const tokenizer = new TiktokenTokenizer(64, 'p50k_base');
    const builder = new PromptBuilder(tokenizer);
    const text = Array.from({ length: 200 }, (_, i) => `flood ${i} near the river bank`).join(' ');

    try {
      const prompt = builder.buildPrompt(text, 'Tweet: {ocr_input}\nIntent:', 16);
      expect(prompt.startsWith('Tweet: flood 0 near the river bank')).toBe(true);
      expect(tokenizer.countTokens(prompt)).toBeLessThanOrEqual(64 - 16);
    } finally {
      tokenizer.dispose();
    }
  });
});

describe('TiktokenTokenizer', () => {
  it('counts and truncates from the end', () => {
    const tokenizer = new TiktokenTokenizer(100, 'p50k_base');

    try {
      expect(tokenizer.countTokens('')).toBe(0);
      expect(tokenizer.truncate('hello world', 0)).toBe('');
      expect(tokenizer.truncate('hello world', -3)).toBe('');
      expect(tokenizer.truncate('hello world', 50)).toBe('hello world');

      const truncated = tokenizer.truncate('alpha beta gamma delta epsilon zeta eta theta', 3);
      expect('alpha beta gamma delta epsilon zeta eta theta'.startsWith(truncated)).toBe(true);
      expect(tokenizer.countTokens(truncated)).toBeLessThanOrEqual(3);
    } finally {
      tokenizer.dispose();
    }
  });

  it('never cuts a multi-byte character in half', () => {
    const tokenizer = new TiktokenTokenizer(100, 'p50k_base');
    const text = 'Enkaz altında çok kişi var, lütfen yardım edin 🙏🙏🙏 yardım';

    try {
      const total = tokenizer.countTokens(text);
      for (let budget = 1; budget < total; budget++) {
        const truncated = tokenizer.truncate(text, budget);
        expect(truncated).not.toContain('\uFFFD');
        expect(text.startsWith(truncated)).toBe(true);
      }
    } finally {
      tokenizer.dispose();
    }
  });

  it('treats special token text as plain text', () => {
    const tokenizer = new TiktokenTokenizer(100, 'p50k_base');

    try {
      expect(tokenizer.countTokens('<|endoftext|>')).toBeGreaterThan(1);
    } finally {
      tokenizer.dispose();
    }
  });
});

describe('completeUtf8Length', () => {
  const bytes = (text: string) => new TextEncoder().encode(text);

  it('keeps complete sequences', () => {
    expect(completeUtf8Length(bytes('a'))).toBe(1);
    expect(completeUtf8Length(bytes('aç'))).toBe(3);
    expect(completeUtf8Length(bytes('🙏'))).toBe(4);
    expect(completeUtf8Length(new Uint8Array())).toBe(0);
  });

  it('drops a trailing partial character', () => {
    expect(completeUtf8Length(bytes('aç').subarray(0, 2))).toBe(1);
    expect(completeUtf8Length(bytes('a🙏').subarray(0, 2))).toBe(1);
    expect(completeUtf8Length(bytes('a🙏').subarray(0, 4))).toBe(1);
  });
});
