import type { ImageRef, Quote } from '../types.js';

const PROMPT_STYLE = 'epic cinematic scenery, motivational, hyperrealistic, 8k';
const PROMPT_QUOTE_CHARS = 20;

export function buildImagePrompt(quote: Quote): string {
  return `${PROMPT_STYLE}, ${quote.text.slice(0, PROMPT_QUOTE_CHARS)}`;
}

// The URL is the image; the service renders it on first request.
export function buildImageRef(baseUrl: string, prompt: string): ImageRef {
  const base = baseUrl.replace(/\/+$/, '');
  return { kind: 'url', url: `${base}/${encodeURIComponent(prompt)}?nologo=true` };
}
