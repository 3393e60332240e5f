/**
 * Article Writer Configuration Loader
 *
 * Parses the environment into an `ArticleWriterConfig` once, at startup.
 * Adapters receive the resulting object and never read `process.env` themselves.
 */

import { z } from 'zod';

import {
  ConfigValidationError,
  RESEARCH_CONFIG,
  WORD_COUNT_CONSTRAINTS,
  WRITER_CONFIG,
} from '../articles/config';
import type { ArticleWriterConfig, ArticleWriterConfigResolution, ArticleWriterStatus } from './types';
import { getModel, type EnvSource } from './utils';

/** Treats blank env values the same as unset ones. */
function blankAsUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const envSchema = z.object({
  OPENROUTER_API_KEY: z.preprocess(
    blankAsUndefined,
    z.string({ required_error: 'is required' }).trim()
  ),
  WIKIPEDIA_CONTACT_EMAIL: z.preprocess(
    blankAsUndefined,
    z.string({ required_error: 'is required' }).trim().email('must be an email address')
  ),
  WIKIPEDIA_LANGUAGE: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .regex(/^[a-z]{2,3}(-[a-z0-9]+)*$/, 'must be a Wikipedia language code such as "en" or "pt"')
      .default(RESEARCH_CONFIG.DEFAULT_LANGUAGE)
  ),
  ARTICLE_MIN_WORDS: z.preprocess(
    blankAsUndefined,
    z.coerce
      .number()
      .int()
      .min(WORD_COUNT_CONSTRAINTS.MIN_WORDS_FLOOR)
      .max(WORD_COUNT_CONSTRAINTS.MIN_WORDS_CEILING)
      .default(WORD_COUNT_CONSTRAINTS.DEFAULT_MIN_WORDS)
  ),
  ARTICLE_WRITER_TEMPERATURE: z.preprocess(
    blankAsUndefined,
    z.coerce.number().min(0).max(2).default(WRITER_CONFIG.TEMPERATURE)
  ),
  WIKIPEDIA_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce
      .number()
      .int()
      .min(RESEARCH_CONFIG.MIN_TIMEOUT_MS)
      .max(RESEARCH_CONFIG.MAX_TIMEOUT_MS)
      .default(RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS)
  ),
  ARTICLE_GENERATION_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce
      .number()
      .int()
      .min(WRITER_CONFIG.MIN_TIMEOUT_MS)
      .max(WRITER_CONFIG.MAX_TIMEOUT_MS)
      .default(WRITER_CONFIG.DEFAULT_TIMEOUT_MS)
  ),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
}

/**
 * Parses the environment without throwing.
 */
export function resolveArticleWriterConfig(env: EnvSource = process.env): ArticleWriterConfigResolution {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return { ok: false, issues: formatIssues(parsed.error) };
  }

  const values = parsed.data;
  return {
    ok: true,
    config: {
      openRouterApiKey: values.OPENROUTER_API_KEY,
      model: getModel('ARTICLE_WRITER', env),
      minWordCount: values.ARTICLE_MIN_WORDS,
      temperature: values.ARTICLE_WRITER_TEMPERATURE,
      generationTimeoutMs: values.ARTICLE_GENERATION_TIMEOUT_MS,
      wikipedia: {
        contactEmail: values.WIKIPEDIA_CONTACT_EMAIL,
        language: values.WIKIPEDIA_LANGUAGE,
        timeoutMs: values.WIKIPEDIA_TIMEOUT_MS,
      },
    },
  };
}

/**
 * Parses the environment, throwing `ConfigValidationError` listing every problem.
 *
 * @example
 * const config = loadArticleWriterConfig();
 * const writer = createArticleWriter(config);
 */
export function loadArticleWriterConfig(env: EnvSource = process.env): ArticleWriterConfig {
  const resolution = resolveArticleWriterConfig(env);
  if (!resolution.ok) {
    throw new ConfigValidationError(resolution.issues.join('; '));
  }
  return resolution.config;
}

/**
 * Summarizes a resolution for the status endpoint and startup logs.
 */
export function describeArticleWriterConfig(
  resolution: ArticleWriterConfigResolution,
  env: EnvSource = process.env
): ArticleWriterStatus {
  if (resolution.ok) {
    return {
      configured: true,
      model: resolution.config.model,
      language: resolution.config.wikipedia.language,
      minWordCount: resolution.config.minWordCount,
      issues: [],
    };
  }
  return {
    configured: false,
    model: getModel('ARTICLE_WRITER', env),
    language: null,
    minWordCount: null,
    issues: resolution.issues,
  };
}
