import { describe, it, expect } from 'vitest';
import { http, HttpResponse } from 'msw';

import {
  WikipediaLookupError,
  buildUserAgent,
  buildWikipediaApiUrl,
  buildWikipediaPageUrl,
  parseWikipediaResponse,
  wikipediaLookup,
} from '../../../src/ai/tools/wikipedia';
import { AI_EXTRACT, WIKIPEDIA_EN_API, WIKIPEDIA_PT_API } from '../../mocks/handlers';
import { server } from '../../mocks/server';

const OPTIONS = { contactEmail: 'writer@example.com' };

describe('URL builders', () => {
  it('requests a plain-text extract with redirects in formatversion 2', () => {
    const url = new URL(buildWikipediaApiUrl('en', 'Alan Turing'));

    expect(url.origin + url.pathname).toBe(WIKIPEDIA_EN_API);
    expect(Object.fromEntries(url.searchParams)).toEqual({
      action: 'query',
      prop: 'extracts',
      exlimit: '1',
      explaintext: '1',
      redirects: '1',
      format: 'json',
      formatversion: '2',
      titles: 'Alan Turing',
    });
  });

  it('builds an article URL with underscores', () => {
    expect(buildWikipediaPageUrl('en', 'Alan Turing')).toBe('https://en.wikipedia.org/wiki/Alan_Turing');
    expect(buildWikipediaPageUrl('pt', 'Inteligência artificial')).toBe(
      'https://pt.wikipedia.org/wiki/Intelig%C3%AAncia_artificial'
    );
  });

  it('identifies the client with the contact email', () => {
    expect(buildUserAgent('writer@example.com')).toBe('WikiArticleWriter/1.0 (writer@example.com)');
  });
});

describe('parseWikipediaResponse', () => {
  it('throws on a body that is not an object', () => {
    expect(() => parseWikipediaResponse('x', 'oops', 'en')).toThrow(WikipediaLookupError);
  });

  it('throws on an API error block', () => {
    const raw = { error: { code: 'badvalue', info: 'Unrecognized value for parameter "action".' } };

    expect(() => parseWikipediaResponse('x', raw, 'en')).toThrow(
      'Wikipedia API error: Unrecognized value for parameter "action".'
    );
  });

  it('returns not found when there is no query block', () => {
    expect(parseWikipediaResponse('x', { batchcomplete: true }, 'en')).toEqual({
      query: 'x',
      found: false,
      pageId: null,
      title: null,
      extract: '',
      url: null,
      truncated: false,
    });
  });

  it('returns not found for an invalid title', () => {
    const raw = { query: { pages: [{ title: 'a|b', invalid: true, invalidreason: 'illegal character' }] } };

    expect(parseWikipediaResponse('a|b', raw, 'en').found).toBe(false);
  });

  it('picks the first existing page when several titles were requested', () => {
    const raw = {
      query: {
        pages: [
          { ns: 0, title: 'Xyzzy', missing: true },
          { pageid: 6678, ns: 0, title: 'Cats', extract: 'Cats are small mammals.' },
        ],
      },
    };

    expect(parseWikipediaResponse('Cats|Xyzzy', raw, 'en')).toEqual({
      query: 'Cats|Xyzzy',
      found: true,
      pageId: 6678,
      title: 'Cats',
      extract: 'Cats are small mammals.',
      url: 'https://en.wikipedia.org/wiki/Cats',
      truncated: false,
    });
  });

  it('returns not found with a URL for a page without extract', () => {
    const raw = { query: { pages: [{ pageid: 7, ns: 0, title: 'Empty', extract: '  ' }] } };

    expect(parseWikipediaResponse('Empty', raw, 'en')).toMatchObject({
      found: false,
      pageId: 7,
      title: 'Empty',
      url: 'https://en.wikipedia.org/wiki/Empty',
    });
  });

  it('truncates long extracts', () => {
    const raw = { query: { pages: [{ pageid: 1, title: 'Long', extract: 'alpha beta gamma delta' }] } };

    const result = parseWikipediaResponse('Long', raw, 'en', 12);

    expect(result.extract).toBe('alpha beta…');
    expect(result.truncated).toBe(true);
  });
});

describe('wikipediaLookup', () => {
  it('returns the extract of the resolved page', async () => {
    const result = await wikipediaLookup('Artificial Intelligence', OPTIONS);

    expect(result).toEqual({
      query: 'Artificial Intelligence',
      found: true,
      pageId: 1164,
      title: 'Artificial intelligence',
      extract: AI_EXTRACT,
      url: 'https://en.wikipedia.org/wiki/Artificial_intelligence',
      truncated: false,
    });
  });

  it('sends the contact user agent and the trimmed topic', async () => {
    let apiUserAgent: string | null = null;
    let titles: string | null = null;
    server.use(
      http.get(WIKIPEDIA_EN_API, ({ request }) => {
        apiUserAgent = request.headers.get('api-user-agent');
        titles = new URL(request.url).searchParams.get('titles');
        return HttpResponse.json({ batchcomplete: true, query: { pages: [{ title: 'Bees', missing: true }] } });
      })
    );

    await wikipediaLookup('  Bees ', OPTIONS);

    expect(apiUserAgent).toBe('WikiArticleWriter/1.0 (writer@example.com)');
    expect(titles).toBe('Bees');
  });

  it('resolves with found: false for a missing page', async () => {
    const result = await wikipediaLookup('Xyzzy Quux', OPTIONS);

    expect(result).toEqual({
      query: 'Xyzzy Quux',
      found: false,
      pageId: null,
      title: 'Xyzzy Quux',
      extract: '',
      url: null,
      truncated: false,
    });
  });

  it('does not call the API for a blank topic', async () => {
    let requests = 0;
    server.use(
      http.get(WIKIPEDIA_EN_API, () => {
        requests += 1;
        return HttpResponse.json({});
      })
    );

    const result = await wikipediaLookup('   ', OPTIONS);

    expect(result.found).toBe(false);
    expect(requests).toBe(0);
  });

  it('queries the configured language', async () => {
    server.use(
      http.get(WIKIPEDIA_PT_API, () =>
        HttpResponse.json({
          query: { pages: [{ pageid: 3, title: 'Inteligência artificial', extract: 'Texto de teste.' }] },
        })
      )
    );

    const result = await wikipediaLookup('Inteligência artificial', { ...OPTIONS, language: 'pt' });

    expect(result.url).toBe('https://pt.wikipedia.org/wiki/Intelig%C3%AAncia_artificial');
    expect(result.extract).toBe('Texto de teste.');
  });

  it('throws WikipediaLookupError with the status on an HTTP error', async () => {
    server.use(http.get(WIKIPEDIA_EN_API, () => new HttpResponse('busy', { status: 503 })));

    const error = await wikipediaLookup('Bees', OPTIONS).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WikipediaLookupError);
    expect(error).toMatchObject({ message: 'Wikipedia responded with HTTP 503', status: 503, timedOut: false });
  });

  it('throws on a network failure', async () => {
    server.use(http.get(WIKIPEDIA_EN_API, () => HttpResponse.error()));

    await expect(wikipediaLookup('Bees', OPTIONS)).rejects.toThrow(/^Wikipedia request failed: /);
  });

  it('throws on a body that is not JSON', async () => {
    server.use(http.get(WIKIPEDIA_EN_API, () => new HttpResponse('<html></html>', { status: 200 })));

    await expect(wikipediaLookup('Bees', OPTIONS)).rejects.toThrow('Wikipedia returned a body that is not valid JSON');
  });

  it('times out a request that never answers', async () => {
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const error = await wikipediaLookup('Bees', { ...OPTIONS, timeoutMs: 1000, fetch: hangingFetch }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(WikipediaLookupError);
    expect(error).toMatchObject({ message: 'Wikipedia request timed out after 1000ms', timedOut: true });
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        if (init?.signal?.aborted) reject(new Error('aborted'));
      });

    await expect(wikipediaLookup('Bees', { ...OPTIONS, signal: controller.signal, fetch: hangingFetch })).rejects.toThrow(
      'Wikipedia request failed: aborted'
    );
  });
});
