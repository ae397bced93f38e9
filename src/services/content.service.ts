import { fetchRandomQuote } from '../integrations/quotes.js';
import { buildImagePrompt, buildImageRef } from '../integrations/images.js';
import type { LLMAdapter } from '../llm/index.js';
import type { Content, ContentProvider, Quote } from '../types.js';

export interface AdFooter {
  text: string;
  link: string;
}

export interface QuoteContentProviderOptions {
  quoteApiUrl: string;
  imageApiUrl: string;
  ad: AdFooter | null;
  /** Optional prompt writer; the template prompt is used without it */
  llm?: LLMAdapter | null;
  fetchQuote?: (url: string) => Promise<Quote>;
}

// Slack reads <…> as links and mentions; & starts an entity.
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatCaption(quote: Quote, ad: AdFooter | null): string {
  let caption = `❝ ${escapeMrkdwn(quote.text)} ❞\n\n~ *${escapeMrkdwn(quote.author)}*`;

  if (ad) {
    caption += `\n\n👇 *Start Your Journey:*\n<${ad.link}|${escapeMrkdwn(ad.text)}>`;
  }

  return caption;
}

/**
 * Quote + generated image. A failed quote fetch rejects with
 * ContentFetchError; a failed LLM call only downgrades the image prompt.
 */
export class QuoteContentProvider implements ContentProvider {
  private readonly fetchQuote: (url: string) => Promise<Quote>;

  constructor(private readonly options: QuoteContentProviderOptions) {
    this.fetchQuote = options.fetchQuote ?? (url => fetchRandomQuote(url));
  }

  async fetch(): Promise<Content> {
    const quote = await this.fetchQuote(this.options.quoteApiUrl);
    const imagePrompt = await this.writeImagePrompt(quote);

    return {
      quote,
      caption: formatCaption(quote, this.options.ad),
      image: buildImageRef(this.options.imageApiUrl, imagePrompt),
      imagePrompt,
    };
  }

  private async writeImagePrompt(quote: Quote): Promise<string> {
    const llm = this.options.llm;
    if (!llm) return buildImagePrompt(quote);

    try {
      const response = await llm.generateImagePrompt(quote);
      return response.content;
    } catch (error) {
      console.warn('[Content] LLM prompt failed, using template prompt:', error);
      return buildImagePrompt(quote);
    }
  }
}
