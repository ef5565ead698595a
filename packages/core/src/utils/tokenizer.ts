// Model tokenizer used for every token budget
import type { TokenizerEncoding } from '@strata-rag/shared';
import { type Tiktoken, getEncoding } from 'js-tiktoken';

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

/**
 * BPE tokenizer backed by js-tiktoken
 */
export class TiktokenTokenizer implements Tokenizer {
  private readonly encoding: Tiktoken;

  constructor(encoding: TokenizerEncoding = 'o200k_base') {
    this.encoding = getEncoding(encoding);
  }

  encode(text: string): number[] {
    return this.encoding.encode(text);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }
}
