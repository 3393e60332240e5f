/**
 * Researcher
 *
 * Research adapter backed by Wikipedia. Turns a topic into a `ResearchContext`
 * the writer can ground the article on.
 */

import { createPrefixedLogger, type StructuredLogger } from '../../../utils/logger';
import type { WikipediaConfig } from '../../config';
import { wikipediaLookup, type WikipediaLookupOptions } from '../../tools/wikipedia';
import { countWords } from '../text-utils';
import type { ResearchAdapter, ResearchContext } from '../types';

export interface ResearcherDeps {
  readonly lookup?: typeof wikipediaLookup;
  readonly fetch?: WikipediaLookupOptions['fetch'];
  readonly logger?: StructuredLogger;
}

/**
 * @example
 * const researcher = createWikipediaResearchAdapter(config.wikipedia);
 * const context = await researcher.research('Alan Turing');
 */
export function createWikipediaResearchAdapter(
  config: WikipediaConfig,
  deps: ResearcherDeps = {}
): ResearchAdapter {
  const lookup = deps.lookup ?? wikipediaLookup;
  const log = deps.logger ?? createPrefixedLogger('[Researcher]');

  return {
    async research(topic: string, signal?: AbortSignal): Promise<ResearchContext> {
      const result = await lookup(topic, {
        contactEmail: config.contactEmail,
        language: config.language,
        timeoutMs: config.timeoutMs,
        signal,
        fetch: deps.fetch,
      });

      log.structured('info', {
        event: 'research_complete',
        topic,
        found: result.found,
        title: result.title,
        words: countWords(result.extract),
        truncated: result.truncated,
      });

      return {
        topic,
        found: result.found,
        title: result.title,
        extract: result.extract,
        url: result.url,
      };
    },
  };
}
