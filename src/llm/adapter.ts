import type { LLMResponse, Quote } from '../types.js';

export interface LLMAdapter {
  /** Writes a short visual prompt for an image that fits the quote. */
  generateImagePrompt(quote: Quote, maxTokens?: number): Promise<LLMResponse>;
}
