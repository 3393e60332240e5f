/**
 * Writer
 *
 * Generation adapter: sends the topic and Wikipedia research to the LLM and
 * returns a structured article (title, summary, introduction, body, conclusion,
 * keywords).
 *
 * The minimum word count is part of the prompt only. Output that comes back
 * shorter is still returned; the pipeline reports it through `meetsMinWordCount`.
 *
 * No retries: the AI SDK retries twice by default, so `maxRetries: 0` is passed
 * explicitly and every failure reaches the caller.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateObject, type LanguageModel } from 'ai';

import { createPrefixedLogger, type StructuredLogger } from '../../../utils/logger';
import type { ArticleWriterConfig } from '../../config';
import { ArticleDraftSchema, type ArticleDraft } from '../article-draft';
import { WRITER_CONFIG } from '../config';
import { getWriterSystemPrompt, getWriterUserPrompt, type WriterPromptContext } from '../prompts';
import { truncateAtWord } from '../text-utils';
import type { GeneratedArticle, GenerationAdapter } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface WriterDeps {
  readonly generateObject: typeof generateObject;
  readonly model: LanguageModel;
  /** Model identifier reported in the result */
  readonly modelId: string;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly logger?: StructuredLogger;
  /** Optional AbortSignal for cancellation support */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Helpers
// ============================================================================

function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized.length > 0) seen.add(normalized);
  }
  return [...seen].slice(0, WRITER_CONFIG.MAX_KEYWORDS);
}

export function toGeneratedArticle(draft: ArticleDraft, modelId: string): GeneratedArticle {
  return {
    title: draft.title.trim(),
    summary: truncateAtWord(draft.summary.trim(), WRITER_CONFIG.SUMMARY_MAX_LENGTH),
    introduction: draft.introduction.trim(),
    body: draft.body.trim(),
    conclusion: draft.conclusion.trim(),
    keywords: normalizeKeywords(draft.keywords),
    model: modelId,
  };
}

function combineSignals(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

// ============================================================================
// Main Writer Function
// ============================================================================

/**
 * Writes one article.
 *
 * @throws Whatever the AI SDK throws (API call errors, schema mismatches,
 *   `TimeoutError` when `timeoutMs` elapses)
 */
export async function runWriter(ctx: WriterPromptContext, deps: WriterDeps): Promise<GeneratedArticle> {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');

  log.info(`Writing "${ctx.topic}" with ${deps.modelId} (min ${ctx.minWordCount} words)`);

  const { object, usage } = await deps.generateObject({
    model: deps.model,
    schema: ArticleDraftSchema,
    system: getWriterSystemPrompt(),
    prompt: getWriterUserPrompt(ctx),
    temperature: deps.temperature,
    maxRetries: 0,
    abortSignal: combineSignals(deps.timeoutMs, deps.signal),
  });

  log.structured('info', {
    event: 'generation_complete',
    topic: ctx.topic,
    model: deps.modelId,
    inputTokens: usage?.inputTokens ?? null,
    outputTokens: usage?.outputTokens ?? null,
  });

  return toGeneratedArticle(object, deps.modelId);
}

// ============================================================================
// Adapter Factory
// ============================================================================

export interface OpenRouterWriterOverrides {
  readonly generateObject?: typeof generateObject;
  readonly openrouter?: ReturnType<typeof createOpenRouter>;
  readonly logger?: StructuredLogger;
}

/**
 * Generation adapter backed by OpenRouter.
 *
 * @example
 * const writer = createOpenRouterGenerationAdapter(config);
 * const article = await writer.generate({ topic, research, minWordCount: 300 });
 */
export function createOpenRouterGenerationAdapter(
  config: ArticleWriterConfig,
  overrides: OpenRouterWriterOverrides = {}
): GenerationAdapter {
  const openrouter = overrides.openrouter ?? createOpenRouter({ apiKey: config.openRouterApiKey });
  const model = openrouter(config.model);

  return {
    generate(request, signal) {
      return runWriter(request, {
        generateObject: overrides.generateObject ?? generateObject,
        model,
        modelId: config.model,
        temperature: config.temperature,
        timeoutMs: config.generationTimeoutMs,
        logger: overrides.logger,
        signal,
      });
    },
  };
}
