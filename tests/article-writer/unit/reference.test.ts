import { describe, it, expect } from 'vitest';

import { formatAccessDate, formatSourceReference } from '../../../src/ai/articles/reference';

describe('formatAccessDate', () => {
  it('formats an ISO timestamp as day, abbreviated month and year in UTC', () => {
    expect(formatAccessDate('2026-10-18T23:30:00.000Z')).toBe('18 Oct. 2026');
  });

  it('does not abbreviate short month names', () => {
    expect(formatAccessDate('2026-05-03T00:00:00.000Z')).toBe('3 May 2026');
  });

  it('returns unparseable input unchanged', () => {
    expect(formatAccessDate('yesterday')).toBe('yesterday');
  });
});

describe('formatSourceReference', () => {
  it('renders an uppercased title, the URL and the access date', () => {
    const reference = formatSourceReference({
      title: 'Alan Turing',
      url: 'https://en.wikipedia.org/wiki/Alan_Turing',
      accessedAt: '2026-10-18T09:00:00.000Z',
    });

    expect(reference).toBe(
      'ALAN TURING. In: WIKIPEDIA, the free encyclopedia. ' +
        'Available at: <https://en.wikipedia.org/wiki/Alan_Turing>. Accessed on: 18 Oct. 2026.'
    );
  });
});
