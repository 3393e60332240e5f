/**
 * Article Writer Types
 *
 * Shared types for the research → write pipeline: request and result records,
 * the two adapter interfaces, and the error type every stage reports through.
 */

import type { StructuredLogger } from '../../utils/logger';

// ============================================================================
// Phase Constants
// ============================================================================

export const ARTICLE_WRITER_PHASES = ['research', 'generation'] as const;

export type ArticleWriterPhase = (typeof ARTICLE_WRITER_PHASES)[number];

// ============================================================================
// Error Types
// ============================================================================

export type ArticleWriterErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_FAILED'
  | 'RESEARCH_FAILED'
  | 'GENERATION_FAILED';

/**
 * Pipeline stage that produced an error.
 */
export type ArticleWriterStage = 'config' | 'validation' | ArticleWriterPhase;

const STAGE_BY_CODE: Record<ArticleWriterErrorCode, ArticleWriterStage> = {
  CONFIG_ERROR: 'config',
  VALIDATION_FAILED: 'validation',
  RESEARCH_FAILED: 'research',
  GENERATION_FAILED: 'generation',
};

/**
 * Error raised by the article writer. `stage` tells callers which step failed.
 *
 * @example
 * try {
 *   await generateArticle({ topic }, deps);
 * } catch (error) {
 *   if (isArticleWriterError(error) && error.code === 'RESEARCH_FAILED') {
 *     // Wikipedia was unreachable
 *   }
 * }
 */
export class ArticleWriterError extends Error {
  readonly name = 'ArticleWriterError';
  readonly stage: ArticleWriterStage;

  constructor(
    readonly code: ArticleWriterErrorCode,
    message: string,
    readonly cause?: unknown,
    readonly details?: unknown
  ) {
    super(message);
    this.stage = STAGE_BY_CODE[code];
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArticleWriterError);
    }
  }
}

export function isArticleWriterError(error: unknown): error is ArticleWriterError {
  return error instanceof ArticleWriterError;
}

// ============================================================================
// Request / Result
// ============================================================================

export interface ArticleRequest {
  readonly topic: string;
}

/**
 * Background gathered for a topic by the research adapter.
 * `found` is false (and `extract` empty) when no usable page exists.
 */
export interface ResearchContext {
  readonly topic: string;
  readonly found: boolean;
  readonly title: string | null;
  readonly extract: string;
  readonly url: string | null;
}

/**
 * Structured article returned by the generation adapter.
 */
export interface GeneratedArticle {
  readonly title: string;
  readonly summary: string;
  readonly introduction: string;
  readonly body: string;
  readonly conclusion: string;
  readonly keywords: readonly string[];
  /** Model that produced the text */
  readonly model: string;
}

export interface ArticleSource {
  readonly title: string;
  readonly url: string;
  /** ISO timestamp of the lookup */
  readonly accessedAt: string;
  /** Bibliographic reference line */
  readonly citation: string;
}

export interface ArticleSections {
  readonly introduction: string;
  readonly body: string;
  readonly conclusion: string;
}

export interface ArticleDurations {
  readonly research: number;
  readonly generation: number;
  readonly total: number;
}

export interface ArticleResult {
  readonly topic: string;
  readonly title: string;
  readonly summary: string;
  /** Introduction, body and conclusion joined by blank lines */
  readonly content: string;
  readonly sections: ArticleSections;
  readonly keywords: readonly string[];
  /** Counted from `content`, not reported by the model */
  readonly wordCount: number;
  readonly minWordCount: number;
  /** Advisory: short articles are returned, not rejected */
  readonly meetsMinWordCount: boolean;
  readonly source: ArticleSource | null;
  readonly model: string;
  readonly generatedAt: string;
  readonly durations: ArticleDurations;
}

// ============================================================================
// Adapters
// ============================================================================

/**
 * Wraps the encyclopedia lookup. Throws when the service cannot be reached;
 * resolves with `found: false` when the topic simply has no page.
 */
export interface ResearchAdapter {
  research(topic: string, signal?: AbortSignal): Promise<ResearchContext>;
}

export interface GenerationRequest {
  readonly topic: string;
  readonly research: ResearchContext;
  readonly minWordCount: number;
}

/**
 * Wraps the hosted LLM. Throws on auth, quota, network or timeout failures.
 */
export interface GenerationAdapter {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedArticle>;
}

export interface ArticleWriterDeps {
  readonly research: ResearchAdapter;
  readonly generation: GenerationAdapter;
  readonly minWordCount: number;
  readonly logger?: StructuredLogger;
  readonly clock?: Clock;
  /** Optional AbortSignal for cancellation support */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for tests.
 *
 * @param initialTime - Starting timestamp in milliseconds
 * @param autoAdvance - If provided, advances time by this many ms on each call
 *
 * @example
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}
