/**
 * Article Writer Pipeline
 *
 * Sequential two-step pipeline:
 * 1. Research: look the topic up on Wikipedia
 * 2. Generation: ask the LLM for an article of at least N words grounded on it
 *
 * Either both steps succeed and an `ArticleResult` is returned, or an
 * `ArticleWriterError` names the stage that failed. There is no partial result
 * and no retry.
 *
 * @example
 * import { createArticleWriter } from '@/ai/articles';
 * import { loadArticleWriterConfig } from '@/ai/config';
 *
 * const writer = createArticleWriter(loadArticleWriterConfig());
 * const article = await writer.generate({ topic: 'Alan Turing' });
 * console.log(article.wordCount, article.content);
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../utils/logger';
import type { ArticleWriterConfig } from '../config';
import { createWikipediaResearchAdapter, type ResearcherDeps } from './agents/researcher';
import { createOpenRouterGenerationAdapter, type OpenRouterWriterOverrides } from './agents/writer';
import { ARTICLE_REQUEST_CONSTRAINTS } from './config';
import { PhaseTimer } from './phase-timer';
import { formatSourceReference } from './reference';
import { countWords, joinParagraphs } from './text-utils';
import {
  ArticleWriterError,
  systemClock,
  type ArticleRequest,
  type ArticleResult,
  type ArticleSource,
  type ArticleWriterDeps,
  type GeneratedArticle,
  type ResearchContext,
} from './types';

// ============================================================================
// Request Validation
// ============================================================================

export const ArticleRequestSchema = z.object({
  topic: z
    .string({ required_error: 'topic is required', invalid_type_error: 'topic must be a string' })
    .trim()
    .min(ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MIN_LENGTH, 'topic must not be empty')
    .max(
      ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MAX_LENGTH,
      `topic must be at most ${ARTICLE_REQUEST_CONSTRAINTS.TOPIC_MAX_LENGTH} characters`
    ),
});

/**
 * Validates and normalizes a request.
 *
 * @throws ArticleWriterError with code VALIDATION_FAILED; `details` holds the zod issues
 */
export function validateArticleRequest(input: unknown): ArticleRequest {
  const parsed = ArticleRequestSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ArticleWriterError('VALIDATION_FAILED', message, undefined, parsed.error.issues);
  }
  return parsed.data;
}

// ============================================================================
// Result Assembly
// ============================================================================

function buildSource(research: ResearchContext, accessedAt: Date): ArticleSource | null {
  if (!research.found || !research.title || !research.url) return null;
  const source = { title: research.title, url: research.url, accessedAt: accessedAt.toISOString() };
  return { ...source, citation: formatSourceReference(source) };
}

export function assembleArticleResult(
  topic: string,
  research: ResearchContext,
  article: GeneratedArticle,
  minWordCount: number,
  timing: { readonly research: number; readonly generation: number; readonly completedAt: Date }
): ArticleResult {
  const content = joinParagraphs([article.introduction, article.body, article.conclusion]);
  const wordCount = countWords(content);

  return {
    topic,
    title: article.title,
    summary: article.summary,
    content,
    sections: {
      introduction: article.introduction,
      body: article.body,
      conclusion: article.conclusion,
    },
    keywords: article.keywords,
    wordCount,
    minWordCount,
    meetsMinWordCount: wordCount >= minWordCount,
    source: buildSource(research, timing.completedAt),
    model: article.model,
    generatedAt: timing.completedAt.toISOString(),
    durations: {
      research: timing.research,
      generation: timing.generation,
      total: timing.research + timing.generation,
    },
  };
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? `timed out (${error.message})` : error.message;
  }
  return String(error);
}

// ============================================================================
// Main Pipeline
// ============================================================================

/**
 * Runs research then generation for one request.
 */
export async function generateArticle(input: unknown, deps: ArticleWriterDeps): Promise<ArticleResult> {
  const log = deps.logger ?? createPrefixedLogger('[ArticleWriter]');
  const clock = deps.clock ?? systemClock;
  const timer = new PhaseTimer(clock);

  const { topic } = validateArticleRequest(input);

  // ===== RESEARCH =====
  timer.start('research');
  let research: ResearchContext;
  try {
    research = await deps.research.research(topic, deps.signal);
  } catch (error) {
    timer.end('research');
    const reason = describeError(error);
    log.error(`Research failed for "${topic}": ${reason}`);
    throw new ArticleWriterError('RESEARCH_FAILED', `Research unavailable: ${reason}`, error);
  }
  timer.end('research');

  if (!research.found) {
    log.warn(`No encyclopedia context found for "${topic}", writing without it`);
  }

  // ===== GENERATION =====
  timer.start('generation');
  let article: GeneratedArticle;
  try {
    article = await deps.generation.generate(
      { topic, research, minWordCount: deps.minWordCount },
      deps.signal
    );
  } catch (error) {
    timer.end('generation');
    const reason = describeError(error);
    log.error(`Generation failed for "${topic}": ${reason}`);
    throw new ArticleWriterError('GENERATION_FAILED', `Article generation failed: ${reason}`, error);
  }
  timer.end('generation');

  const durations = timer.getDurations();
  const result = assembleArticleResult(topic, research, article, deps.minWordCount, {
    research: durations.research,
    generation: durations.generation,
    completedAt: new Date(clock.now()),
  });

  if (!result.meetsMinWordCount) {
    log.warn(`Article for "${topic}" has ${result.wordCount} words, below the requested ${result.minWordCount}`);
  }

  log.structured('info', {
    event: 'article_generated',
    topic,
    model: result.model,
    wordCount: result.wordCount,
    minWordCount: result.minWordCount,
    contextFound: research.found,
    researchMs: result.durations.research,
    generationMs: result.durations.generation,
  });

  return result;
}

// ============================================================================
// Composition
// ============================================================================

export interface ArticleWriter {
  generate(input: unknown, signal?: AbortSignal): Promise<ArticleResult>;
}

export interface ArticleWriterOverrides {
  readonly researcher?: ResearcherDeps;
  readonly writer?: OpenRouterWriterOverrides;
  readonly clock?: ArticleWriterDeps['clock'];
  readonly logger?: ArticleWriterDeps['logger'];
}

/**
 * Wires the Wikipedia researcher and the OpenRouter writer from one config object.
 */
export function createArticleWriter(
  config: ArticleWriterConfig,
  overrides: ArticleWriterOverrides = {}
): ArticleWriter {
  const research = createWikipediaResearchAdapter(config.wikipedia, overrides.researcher);
  const generation = createOpenRouterGenerationAdapter(config, overrides.writer);

  return {
    generate(input, signal) {
      return generateArticle(input, {
        research,
        generation,
        minWordCount: config.minWordCount,
        clock: overrides.clock,
        logger: overrides.logger,
        signal,
      });
    },
  };
}
