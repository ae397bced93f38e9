import OpenAI from 'openai';
import type { LLMAdapter } from './adapter.js';
import type { LLMResponse, Quote } from '../types.js';
import { CircuitBreaker } from '../circuit-breaker/index.js';

// Module-level singleton — shared across all OpenAIAdapter instances
const openaiCircuit = new CircuitBreaker({
  serviceName: 'openai',
  failureThreshold: 3,
  resetTimeoutMs: 120_000,  // 2 minutes — LLM outages recover slower
  successThreshold: 2,
});

const SYSTEM_PROMPT =
  'You write prompts for an image generator. Given a quote, describe one cinematic, ' +
  'motivational scene in under 40 words. No text, letters or people\'s names in the image. ' +
  'Return only the prompt.';

export class OpenAIAdapter implements LLMAdapter {
  private client: OpenAI;
  private model: string;

  constructor(options: { apiKey: string; model: string }) {
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async generateImagePrompt(quote: Quote, maxTokens: number = 120): Promise<LLMResponse> {
    return openaiCircuit.execute(async () => {
      try {
        const response = await this.client.chat.completions.create({
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: `"${quote.text}" — ${quote.author}` },
          ],
          max_tokens: maxTokens,
          temperature: 0.9,
        });

        const content = response.choices[0]?.message?.content?.trim() || '';

        if (!content) {
          throw new Error('No prompt generated from OpenAI');
        }

        return {
          content,
          provider: 'openai',
          model: this.model,
        };
      } catch (error) {
        console.error('OpenAI prompt error:', error);
        throw new Error('Unable to write an image prompt right now');
      }
    });
  }
}
