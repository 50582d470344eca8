import { get_encoding, type Tiktoken, type TiktokenEncoding } from 'tiktoken';
import type { Tokenizer } from './Tokenizer.interface.js';

/**
 * Length of `bytes` without a trailing partial UTF-8 sequence. A token cut can
 * split a multi-byte character; decoding the fragment would yield U+FFFD.
 */
export function completeUtf8Length(bytes: Uint8Array): number {
  for (let i = bytes.length - 1; i >= Math.max(0, bytes.length - 4); i--) {
    const byte = bytes[i];
    if ((byte & 0xc0) === 0x80) {
      continue;
    }
    const size = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return i + size <= bytes.length ? bytes.length : i;
  }
  return bytes.length;
}

export class TiktokenTokenizer implements Tokenizer {
  private encoder: Tiktoken;
  private decoder = new TextDecoder();

  constructor(
    readonly maxTokens: number,
    encoding: TiktokenEncoding = 'p50k_base'
  ) {
    this.encoder = get_encoding(encoding);
  }

  countTokens(text: string): number {
    return this.encode(text).length;
  }

  truncate(text: string, maxTokens: number): string {
    if (maxTokens <= 0) {
      return '';
    }

    const tokens = this.encode(text);
    if (tokens.length <= maxTokens) {
      return text;
    }

    const bytes = this.encoder.decode(tokens.slice(0, maxTokens));
    return this.decoder.decode(bytes.subarray(0, completeUtf8Length(bytes)));
  }

  private encode(text: string): Uint32Array {
    // special tokens in user text are encoded as plain text
    return this.encoder.encode(text, [], []);
  }

  dispose(): void {
    this.encoder.free();
  }
}
