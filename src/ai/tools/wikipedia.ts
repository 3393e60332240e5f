/**
 * Wikipedia (MediaWiki Action API) lookup.
 *
 * Fetches the plain-text extract of the page whose title best matches the topic,
 * following redirects.
 *
 * Docs: https://www.mediawiki.org/wiki/Extension:TextExtracts#API
 *
 * Wikimedia asks every client to identify itself with a descriptive User-Agent
 * that includes contact details, so a contact email is mandatory here.
 * See https://foundation.wikimedia.org/wiki/Policy:User-Agent_policy
 *
 * Throws `WikipediaLookupError` when the service cannot be reached. A topic
 * without a page is not an error: it resolves with `found: false`.
 */

import { RESEARCH_CONFIG } from '../articles/config';
import { truncateAtWord } from '../articles/text-utils';

export interface WikipediaLookupOptions {
  readonly contactEmail: string;
  /** Language subdomain (default: 'en') */
  readonly language?: string;
  readonly timeoutMs?: number;
  /** Longest extract returned (default: RESEARCH_CONFIG.MAX_EXTRACT_CHARS) */
  readonly maxExtractChars?: number;
  readonly signal?: AbortSignal;
  /** Override for tests */
  readonly fetch?: typeof fetch;
}

export interface WikipediaLookupResult {
  readonly query: string;
  readonly found: boolean;
  readonly pageId: number | null;
  readonly title: string | null;
  readonly extract: string;
  readonly url: string | null;
  /** True when the extract was cut to maxExtractChars */
  readonly truncated: boolean;
}

export class WikipediaLookupError extends Error {
  readonly name = 'WikipediaLookupError';

  constructor(
    message: string,
    readonly status?: number,
    readonly timedOut: boolean = false,
    readonly cause?: unknown
  ) {
    super(message);
  }
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

function safeString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildWikipediaApiUrl(language: string, title: string): string {
  const params = new URLSearchParams({
    action: 'query',
    prop: 'extracts',
    exlimit: '1',
    explaintext: '1',
    redirects: '1',
    format: 'json',
    formatversion: '2',
    titles: title,
  });
  return `https://${language}.wikipedia.org/w/api.php?${params.toString()}`;
}

export function buildWikipediaPageUrl(language: string, title: string): string {
  return `https://${language}.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, '_'))}`;
}

export function buildUserAgent(contactEmail: string): string {
  return `${RESEARCH_CONFIG.USER_AGENT_NAME}/${RESEARCH_CONFIG.USER_AGENT_VERSION} (${contactEmail})`;
}

function notFound(query: string, title: string | null = null, url: string | null = null, pageId: number | null = null): WikipediaLookupResult {
  return { query, found: false, pageId, title, extract: '', url, truncated: false };
}

/**
 * Parses a `formatversion=2` query response.
 * Throws when the body is not a MediaWiki query response at all.
 */
export function parseWikipediaResponse(
  query: string,
  raw: unknown,
  language: string,
  maxExtractChars: number = RESEARCH_CONFIG.MAX_EXTRACT_CHARS
): WikipediaLookupResult {
  if (!isRecord(raw)) {
    throw new WikipediaLookupError('Wikipedia returned an unexpected response body');
  }

  if (isRecord(raw.error)) {
    const info = safeString(raw.error.info) ?? safeString(raw.error.code) ?? 'unknown error';
    throw new WikipediaLookupError(`Wikipedia API error: ${info}`);
  }

  if (!isRecord(raw.query)) {
    // batchcomplete without a query block happens for empty titles
    return notFound(query);
  }

  // `|` in a title asks for several pages, and missing ones are listed first
  const pages: unknown[] = Array.isArray(raw.query.pages) ? raw.query.pages : [];
  const page = pages.find((p) => isRecord(p) && p.missing !== true && p.invalid !== true) ?? pages[0];
  if (!isRecord(page)) {
    return notFound(query);
  }

  const title = safeString(page.title) ?? null;
  if (page.missing === true || page.invalid === true || !title) {
    return notFound(query, title);
  }

  const pageId = typeof page.pageid === 'number' ? page.pageid : null;
  const url = buildWikipediaPageUrl(language, title);
  const extract = safeString(page.extract);
  if (!extract) {
    return notFound(query, title, url, pageId);
  }

  const limited = truncateAtWord(extract, maxExtractChars);
  return {
    query,
    found: true,
    pageId,
    title,
    extract: limited,
    url,
    truncated: limited !== extract,
  };
}

/**
 * Looks up `topic` on Wikipedia.
 *
 * @example
 * const result = await wikipediaLookup('Alan Turing', { contactEmail: 'writer@example.com' });
 * if (result.found) console.log(result.extract.slice(0, 200));
 */
export async function wikipediaLookup(
  topic: string,
  options: WikipediaLookupOptions
): Promise<WikipediaLookupResult> {
  const query = topic.trim();
  if (query.length === 0) {
    return notFound(query);
  }

  const language = options.language ?? RESEARCH_CONFIG.DEFAULT_LANGUAGE;
  const timeoutMs = clampInt(
    options.timeoutMs ?? RESEARCH_CONFIG.DEFAULT_TIMEOUT_MS,
    RESEARCH_CONFIG.MIN_TIMEOUT_MS,
    RESEARCH_CONFIG.MAX_TIMEOUT_MS
  );
  const fetchImpl = options.fetch ?? fetch;

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onExternalAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const userAgent = buildUserAgent(options.contactEmail);

  try {
    let res: Response;
    try {
      res = await fetchImpl(buildWikipediaApiUrl(language, query), {
        method: 'GET',
        headers: {
          accept: 'application/json',
          'user-agent': userAgent,
          'api-user-agent': userAgent,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new WikipediaLookupError(`Wikipedia request timed out after ${timeoutMs}ms`, undefined, true, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new WikipediaLookupError(`Wikipedia request failed: ${message}`, undefined, false, error);
    }

    if (!res.ok) {
      throw new WikipediaLookupError(`Wikipedia responded with HTTP ${res.status}`, res.status);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new WikipediaLookupError('Wikipedia returned a body that is not valid JSON', res.status, false, error);
    }

    return parseWikipediaResponse(query, json, language, options.maxExtractChars);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onExternalAbort);
  }
}
