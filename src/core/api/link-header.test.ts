import { describe, it, expect } from 'vitest';
import { parseLinkHeader, parseNextCursor } from './link-header.js';

describe('parseLinkHeader', () => {
  it('parses self and next relations', () => {
    const header =
      '<https://org.example.com/api/v1/users?limit=2>; rel="self", ' +
      '<https://org.example.com/api/v1/users?after=00u0002&limit=2>; rel="next"';

    expect(parseLinkHeader(header)).toEqual([
      { url: 'https://org.example.com/api/v1/users?limit=2', rel: 'self' },
      { url: 'https://org.example.com/api/v1/users?after=00u0002&limit=2', rel: 'next' },
    ]);
  });

  it('splits space-separated relation names', () => {
    expect(parseLinkHeader('<https://a.example.com/x>; rel="next last"')).toEqual([
      { url: 'https://a.example.com/x', rel: 'next' },
      { url: 'https://a.example.com/x', rel: 'last' },
    ]);
  });

  it('returns nothing for a missing or malformed header', () => {
    expect(parseLinkHeader(undefined)).toEqual([]);
    expect(parseLinkHeader('not a link')).toEqual([]);
  });
});

describe('parseNextCursor', () => {
  it('returns the after parameter of the next link', () => {
    const header = '<https://org.example.com/api/v1/groups?after=00g0009&limit=200>; rel="next"';
    expect(parseNextCursor(header)).toBe('00g0009');
  });

  it('returns null on the last page', () => {
    expect(parseNextCursor('<https://org.example.com/api/v1/groups?limit=200>; rel="self"')).toBeNull();
  });

  it('returns null when the next link has no cursor', () => {
    expect(parseNextCursor('<https://org.example.com/api/v1/groups>; rel="next"')).toBeNull();
  });
});
