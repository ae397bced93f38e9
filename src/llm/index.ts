import type { LLMAdapter } from './adapter.js';
import { OpenAIAdapter } from './openai.js';

// Reusable Singleton cache, keyed by model
const adapterCache = new Map<string, LLMAdapter>();

/** Returns null when no LLM is configured; callers fall back to the template prompt. */
export function getLLMAdapter(openai: { apiKey: string; model: string } | null): LLMAdapter | null {
  if (!openai) return null;

  const cached = adapterCache.get(openai.model);
  if (cached) return cached;

  const adapter = new OpenAIAdapter(openai);
  adapterCache.set(openai.model, adapter);
  return adapter;
}

export * from './adapter.js';
