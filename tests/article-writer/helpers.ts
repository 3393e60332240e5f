import { vi } from 'vitest';

import type { ArticleDraft } from '../../src/ai/articles/article-draft';
import type { ResearchContext } from '../../src/ai/articles/types';
import type { ArticleWriterConfig } from '../../src/ai/config/types';
import { AI_EXTRACT } from '../mocks/handlers';

export const createTestLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  structured: vi.fn(),
});

/** `count` distinct words: `word1 word2 ...` */
export const makeWords = (count: number, prefix = 'word'): string =>
  Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`).join(' ');

export const createTestConfig = (overrides: Partial<ArticleWriterConfig> = {}): ArticleWriterConfig => ({
  openRouterApiKey: 'test-secret',
  model: 'test/article-model',
  minWordCount: 300,
  temperature: 0.7,
  generationTimeoutMs: 120_000,
  wikipedia: {
    contactEmail: 'writer@example.com',
    language: 'en',
    timeoutMs: 15_000,
  },
  ...overrides,
});

/** 60 + 200 + 60 = 320 words */
export const createDraft = (overrides: Partial<ArticleDraft> = {}): ArticleDraft => ({
  title: 'Artificial Intelligence: How Machines Learn',
  summary: 'A short tour of what artificial intelligence is and how it is used.',
  introduction: makeWords(60, 'intro'),
  body: `${makeWords(100, 'body')}\n\n${makeWords(100, 'more')}`,
  conclusion: makeWords(60, 'end'),
  keywords: ['AI', 'Machine Learning', 'computer science'],
  ...overrides,
});

export const createGenerateObjectResult = (draft: ArticleDraft = createDraft()) => ({
  object: draft,
  usage: { inputTokens: 120, outputTokens: 480, totalTokens: 600 },
});

export const createFoundResearch = (overrides: Partial<ResearchContext> = {}): ResearchContext => ({
  topic: 'Artificial Intelligence',
  found: true,
  title: 'Artificial intelligence',
  extract: AI_EXTRACT,
  url: 'https://en.wikipedia.org/wiki/Artificial_intelligence',
  ...overrides,
});

export const createEmptyResearch = (topic = 'Xyzzy Quux'): ResearchContext => ({
  topic,
  found: false,
  title: null,
  extract: '',
  url: null,
});
