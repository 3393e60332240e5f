import { describe, it, expect, vi } from 'vitest';

import { createWikipediaResearchAdapter } from '../../../src/ai/articles/agents/researcher';
import { WikipediaLookupError } from '../../../src/ai/tools/wikipedia';
import { AI_EXTRACT } from '../../mocks/handlers';
import { createTestConfig, createTestLogger } from '../helpers';

const wikipediaConfig = createTestConfig().wikipedia;

describe('Wikipedia research adapter', () => {
  it('maps a found page to a research context', async () => {
    const logger = createTestLogger();
    const researcher = createWikipediaResearchAdapter(wikipediaConfig, { logger });

    const context = await researcher.research('Artificial Intelligence');

    expect(context).toEqual({
      topic: 'Artificial Intelligence',
      found: true,
      title: 'Artificial intelligence',
      extract: AI_EXTRACT,
      url: 'https://en.wikipedia.org/wiki/Artificial_intelligence',
    });
  });

  it('maps a missing page to an empty context', async () => {
    const researcher = createWikipediaResearchAdapter(wikipediaConfig, { logger: createTestLogger() });

    const context = await researcher.research('Xyzzy Quux');

    expect(context.found).toBe(false);
    expect(context.extract).toBe('');
    expect(context.url).toBeNull();
  });

  it('passes the configured contact, language and timeout to the lookup', async () => {
    const lookup = vi.fn().mockResolvedValue({
      query: 'Bees',
      found: false,
      pageId: null,
      title: null,
      extract: '',
      url: null,
      truncated: false,
    });
    const signal = new AbortController().signal;
    const researcher = createWikipediaResearchAdapter(
      { contactEmail: 'writer@example.com', language: 'pt', timeoutMs: 5000 },
      { lookup, logger: createTestLogger() }
    );

    await researcher.research('Bees', signal);

    expect(lookup).toHaveBeenCalledWith('Bees', {
      contactEmail: 'writer@example.com',
      language: 'pt',
      timeoutMs: 5000,
      signal,
      fetch: undefined,
    });
  });

  it('logs a structured research_complete event', async () => {
    const logger = createTestLogger();
    const researcher = createWikipediaResearchAdapter(wikipediaConfig, { logger });

    await researcher.research('Artificial Intelligence');

    expect(logger.structured).toHaveBeenCalledWith('info', {
      event: 'research_complete',
      topic: 'Artificial Intelligence',
      found: true,
      title: 'Artificial intelligence',
      words: 40,
      truncated: false,
    });
  });

  it('propagates lookup failures', async () => {
    const lookup = vi.fn().mockRejectedValue(new WikipediaLookupError('Wikipedia responded with HTTP 503', 503));
    const researcher = createWikipediaResearchAdapter(wikipediaConfig, { lookup, logger: createTestLogger() });

    await expect(researcher.research('Bees')).rejects.toThrow('Wikipedia responded with HTTP 503');
  });
});
