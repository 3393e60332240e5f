import { generateObject, type LanguageModel } from 'ai';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { runWriter, toGeneratedArticle, type WriterDeps } from '../../../src/ai/articles/agents/writer';
import { ArticleDraftSchema, type ArticleDraft } from '../../../src/ai/articles/article-draft';
import { getWriterUserPrompt, type WriterPromptContext } from '../../../src/ai/articles/prompts';
import {
  createDraft,
  createEmptyResearch,
  createFoundResearch,
  createGenerateObjectResult,
  createTestLogger,
} from '../helpers';

// ============================================================================
// Fixtures
// ============================================================================

const createContext = (overrides: Partial<WriterPromptContext> = {}): WriterPromptContext => ({
  topic: 'Artificial Intelligence',
  research: createFoundResearch(),
  minWordCount: 300,
  ...overrides,
});

type ProviderModel = Exclude<LanguageModel, string>;

/** Model that answers every call with `draft` serialized as JSON */
const createJsonModel = (draft: ArticleDraft): ProviderModel => ({
  specificationVersion: 'v2',
  provider: 'test',
  modelId: 'test/article-model',
  supportedUrls: {},
  doGenerate: async () => ({
    content: [{ type: 'text', text: JSON.stringify(draft) }],
    finishReason: 'stop',
    usage: { inputTokens: 120, outputTokens: 480, totalTokens: 600 },
    warnings: [],
  }),
  doStream: async () => {
    throw new Error('streaming is not used by the writer');
  },
});

// ============================================================================
// Prompt
// ============================================================================

describe('getWriterUserPrompt', () => {
  it('includes the topic, the source and the minimum word count', () => {
    const prompt = getWriterUserPrompt(createContext());

    expect(prompt).toContain('Write an article about "Artificial Intelligence".');
    expect(prompt).toContain('Source: Artificial intelligence (https://en.wikipedia.org/wiki/Artificial_intelligence)');
    expect(prompt).toContain('- Length: at least 300 words across introduction, body and conclusion combined.');
  });

  it('states that no research was found', () => {
    const prompt = getWriterUserPrompt(createContext({ research: createEmptyResearch('Xyzzy Quux') }));

    expect(prompt).toContain('No encyclopedia article was found for this topic.');
    expect(prompt).not.toContain('Source:');
  });
});

// ============================================================================
// Writer
// ============================================================================

describe('Writer', () => {
  let mockGenerateObject: ReturnType<typeof vi.fn>;
  let deps: WriterDeps;

  beforeEach(() => {
    mockGenerateObject = vi.fn().mockResolvedValue(createGenerateObjectResult());
    deps = {
      generateObject: mockGenerateObject,
      model: 'test/article-model',
      modelId: 'test/article-model',
      temperature: 0.7,
      timeoutMs: 120_000,
      logger: createTestLogger(),
    };
  });

  it('calls generateObject once with the draft schema and no retries', async () => {
    await runWriter(createContext(), deps);

    expect(mockGenerateObject).toHaveBeenCalledTimes(1);
    const options = mockGenerateObject.mock.calls[0][0];
    expect(options.model).toBe('test/article-model');
    expect(options.schema).toBe(ArticleDraftSchema);
    expect(options.temperature).toBe(0.7);
    expect(options.maxRetries).toBe(0);
    expect(options.abortSignal).toBeInstanceOf(AbortSignal);
    expect(options.prompt).toBe(getWriterUserPrompt(createContext()));
  });

  it('returns the trimmed article with normalized keywords', async () => {
    mockGenerateObject.mockResolvedValue(
      createGenerateObjectResult(
        createDraft({
          title: '  Artificial Intelligence  ',
          keywords: ['AI', ' Machine Learning ', 'ai', 'robots'],
        })
      )
    );

    const article = await runWriter(createContext(), deps);

    expect(article.title).toBe('Artificial Intelligence');
    expect(article.keywords).toEqual(['ai', 'machine learning', 'robots']);
    expect(article.model).toBe('test/article-model');
  });

  it('logs token usage', async () => {
    const logger = createTestLogger();

    await runWriter(createContext(), { ...deps, logger });

    expect(logger.structured).toHaveBeenCalledWith('info', {
      event: 'generation_complete',
      topic: 'Artificial Intelligence',
      model: 'test/article-model',
      inputTokens: 120,
      outputTokens: 480,
    });
  });

  it('propagates generation errors', async () => {
    mockGenerateObject.mockRejectedValue(new Error('401 Unauthorized'));

    await expect(runWriter(createContext(), deps)).rejects.toThrow('401 Unauthorized');
  });

  it('aborts the call when the timeout elapses', async () => {
    mockGenerateObject.mockImplementation(
      ({ abortSignal }: { abortSignal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          abortSignal.addEventListener('abort', () => reject(abortSignal.reason));
        })
    );

    const error = await runWriter(createContext(), { ...deps, timeoutMs: 20 }).catch((err: unknown) => err);

    expect(error instanceof Error ? error.name : null).toBe('TimeoutError');
  });
});

describe('Writer with the AI SDK', () => {
  const createDeps = (draft: ArticleDraft): WriterDeps => ({
    generateObject,
    model: createJsonModel(draft),
    modelId: 'test/article-model',
    temperature: 0.7,
    timeoutMs: 120_000,
    logger: createTestLogger(),
  });

  it('accepts an article with too many keywords and a long summary', async () => {
    const draft = createDraft({
      summary: 'lorem '.repeat(120).trim(),
      keywords: ['k1', 'k2', 'k3', 'k4', 'k5', 'k6', 'k7', 'k8', 'k9'],
    });

    const article = await runWriter(createContext(), createDeps(draft));

    expect(article.keywords).toEqual(['k1', 'k2', 'k3', 'k4', 'k5', 'k6', 'k7', 'k8']);
    expect(article.summary).toBe(`${'lorem '.repeat(100).trim()}…`);
    expect(article.summary).toHaveLength(600);
    expect(article.introduction).toBe(draft.introduction);
  });

  it('accepts an article with fewer keywords than requested', async () => {
    const article = await runWriter(createContext(), createDeps(createDraft({ keywords: ['Bees'] })));

    expect(article.keywords).toEqual(['bees']);
  });
});

describe('toGeneratedArticle', () => {
  it('drops blank keywords', () => {
    const article = toGeneratedArticle(createDraft({ keywords: ['history', '  ', 'science'] }), 'm');

    expect(article.keywords).toEqual(['history', 'science']);
  });

  it('keeps at most eight keywords after removing duplicates', () => {
    const keywords = ['A', 'a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i'];

    const article = toGeneratedArticle(createDraft({ keywords }), 'm');

    expect(article.keywords).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']);
  });

  it('leaves a summary within the limit untouched', () => {
    const article = toGeneratedArticle(createDraft({ summary: '  Bees make honey.  ' }), 'm');

    expect(article.summary).toBe('Bees make honey.');
  });
});
