/**
 * Bibliographic reference for the Wikipedia page an article was grounded on.
 */

import type { ArticleSource } from './types';

const MONTHS = ['Jan.', 'Feb.', 'Mar.', 'Apr.', 'May', 'June', 'July', 'Aug.', 'Sept.', 'Oct.', 'Nov.', 'Dec.'] as const;

/**
 * Formats an ISO timestamp as `18 Oct. 2026` (UTC). Unparseable input is returned as is.
 */
export function formatAccessDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return `${date.getUTCDate()} ${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

/**
 * @example
 * formatSourceReference({ title: 'Alan Turing', url: 'https://en.wikipedia.org/wiki/Alan_Turing', accessedAt: '2026-10-18T09:00:00.000Z' });
 * // 'ALAN TURING. In: WIKIPEDIA, the free encyclopedia. Available at: <https://en.wikipedia.org/wiki/Alan_Turing>. Accessed on: 18 Oct. 2026.'
 */
export function formatSourceReference(source: Pick<ArticleSource, 'title' | 'url' | 'accessedAt'>): string {
  return (
    `${source.title.toUpperCase()}. In: WIKIPEDIA, the free encyclopedia. ` +
    `Available at: <${source.url}>. Accessed on: ${formatAccessDate(source.accessedAt)}.`
  );
}
