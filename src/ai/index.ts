/**
 * AI Module
 *
 * ## Structure
 *
 * - `/config/` - Environment parsing and model selection
 * - `/tools/` - External lookups (Wikipedia)
 * - `/articles/` - Research → write pipeline
 *
 * ## Usage
 *
 * ```typescript
 * import { createArticleWriter, resolveArticleWriterConfig } from '@/ai';
 *
 * const resolution = resolveArticleWriterConfig();
 * if (resolution.ok) {
 *   const article = await createArticleWriter(resolution.config).generate({ topic: 'Bees' });
 * }
 * ```
 */

export * from './articles';
export * from './config';
export {
  wikipediaLookup,
  WikipediaLookupError,
  type WikipediaLookupOptions,
  type WikipediaLookupResult,
} from './tools/wikipedia';
