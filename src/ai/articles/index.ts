/**
 * Article Writer Module
 *
 * Researches a topic on Wikipedia and writes an article about it with an LLM.
 *
 * @example
 * import { createArticleWriter } from '@/ai/articles';
 *
 * const writer = createArticleWriter(loadArticleWriterConfig());
 * const article = await writer.generate({ topic: 'Photosynthesis' });
 */

// Main pipeline
export {
  generateArticle,
  createArticleWriter,
  validateArticleRequest,
  assembleArticleResult,
  ArticleRequestSchema,
  type ArticleWriter,
  type ArticleWriterOverrides,
} from './generate-article';

// Adapters
export { createWikipediaResearchAdapter, type ResearcherDeps } from './agents/researcher';
export {
  createOpenRouterGenerationAdapter,
  runWriter,
  toGeneratedArticle,
  type OpenRouterWriterOverrides,
  type WriterDeps,
} from './agents/writer';

// Types
export {
  ArticleWriterError,
  isArticleWriterError,
  ARTICLE_WRITER_PHASES,
  systemClock,
  createMockClock,
  type ArticleWriterErrorCode,
  type ArticleWriterStage,
  type ArticleWriterPhase,
  type ArticleRequest,
  type ArticleResult,
  type ArticleSource,
  type ArticleSections,
  type ArticleDurations,
  type ResearchContext,
  type GeneratedArticle,
  type GenerationRequest,
  type ResearchAdapter,
  type GenerationAdapter,
  type ArticleWriterDeps,
  type Clock,
} from './types';

export { ArticleDraftSchema, type ArticleDraft } from './article-draft';
export { formatSourceReference, formatAccessDate } from './reference';
export { countWords } from './text-utils';
export { PhaseTimer } from './phase-timer';

// Configuration
export {
  ARTICLE_REQUEST_CONSTRAINTS,
  WORD_COUNT_CONSTRAINTS,
  RESEARCH_CONFIG,
  WRITER_CONFIG,
  SERVER_CONFIG,
  ConfigValidationError,
} from './config';
