/**
 * AI Configuration Types
 */

export interface WikipediaConfig {
  /** Contact address sent in the User-Agent (Wikimedia API etiquette) */
  readonly contactEmail: string;
  /** Language subdomain, e.g. 'en' for en.wikipedia.org */
  readonly language: string;
  readonly timeoutMs: number;
}

/**
 * Everything the article writer needs, read once at startup.
 */
export interface ArticleWriterConfig {
  readonly openRouterApiKey: string;
  /** OpenRouter model identifier (e.g. 'google/gemini-2.0-flash-001') */
  readonly model: string;
  /** Minimum length requested from the model. Advisory only. */
  readonly minWordCount: number;
  readonly temperature: number;
  readonly generationTimeoutMs: number;
  readonly wikipedia: WikipediaConfig;
}

export type ArticleWriterConfigResolution =
  | { readonly ok: true; readonly config: ArticleWriterConfig }
  | { readonly ok: false; readonly issues: readonly string[] };

/**
 * Public view of the configuration. Never contains secrets.
 */
export interface ArticleWriterStatus {
  readonly configured: boolean;
  readonly model: string;
  readonly language: string | null;
  readonly minWordCount: number | null;
  readonly issues: readonly string[];
}
