/**
 * Pagination cursors from RFC 8288 `Link` headers.
 *
 * The provider answers collection requests with
 * `Link: <https://org/api/v1/users?after=00u1&limit=200>; rel="next"`;
 * the cursor is the `after` query parameter of the `next` link.
 */

export interface LinkRelation {
  url: string;
  rel: string;
}

export function parseLinkHeader(header: string | undefined): LinkRelation[] {
  if (!header) return [];

  const links: LinkRelation[] = [];
  for (const part of header.split(/,\s*(?=<)/)) {
    const match = /^\s*<([^>]*)>\s*;(.*)$/.exec(part);
    if (!match) continue;
    const url = match[1] ?? '';
    const params = match[2] ?? '';
    const rel = /\brel="?([^";]+)"?/.exec(params);
    if (rel?.[1]) {
      for (const name of rel[1].trim().split(/\s+/)) {
        links.push({ url, rel: name });
      }
    }
  }
  return links;
}

/** The `after` cursor of the `next` link, or null on the last page. */
export function parseNextCursor(header: string | undefined): string | null {
  const next = parseLinkHeader(header).find((link) => link.rel === 'next');
  if (!next) return null;

  try {
    return new URL(next.url).searchParams.get('after');
  } catch {
    return null;
  }
}
