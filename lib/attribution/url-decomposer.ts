/**
 * Lenient URL decomposition: scheme, host, path and an ordered query multimap.
 * Never throws. Malformed input yields empty fields (query parameters excepted)
 * so classification can still fall through to referral/direct.
 */

import type { ParsedUrl } from './types';

/**
 * Ordered multimap of query parameters. Keys are case-sensitive as given;
 * `get` follows the query-string convention (last value wins).
 */
export class QueryParams {
  private readonly pairs: ReadonlyArray<readonly [string, string]>;

  constructor(pairs: ReadonlyArray<readonly [string, string]> = []) {
    this.pairs = Object.freeze(pairs.map(([k, v]) => Object.freeze([k, v] as const)));
  }

  get(key: string): string | undefined {
    for (let i = this.pairs.length - 1; i >= 0; i--) {
      if (this.pairs[i][0] === key) return this.pairs[i][1];
    }
    return undefined;
  }

  getAll(key: string): string[] {
    return this.pairs.filter(([k]) => k === key).map(([, v]) => v);
  }

  has(key: string): boolean {
    return this.pairs.some(([k]) => k === key);
  }

  /** Ordered keys without duplicates (first occurrence order). */
  keys(): string[] {
    return [...new Set(this.pairs.map(([k]) => k))];
  }

  entries(): Array<readonly [string, string]> {
    return [...this.pairs];
  }

  get size(): number {
    return this.pairs.length;
  }
}

const EMPTY: ParsedUrl = Object.freeze({
  scheme: '',
  host: '',
  path: '',
  params: new QueryParams(),
});

/**
 * Decode a query component: "+" is a space, then percent-decoding.
 * On a malformed escape the raw substring is returned unchanged.
 */
export function decodeComponent(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    return raw;
  }
}

/**
 * Split a query string on "&", each segment on the first "=".
 * A segment without "=" is a key with an empty value.
 */
export function parseQueryString(query: string): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  const q = query.startsWith('?') ? query.slice(1) : query;
  if (!q) return out;

  for (const segment of q.split('&')) {
    if (!segment) continue;
    const eq = segment.indexOf('=');
    const rawKey = eq === -1 ? segment : segment.slice(0, eq);
    const rawValue = eq === -1 ? '' : segment.slice(eq + 1);
    const key = decodeComponent(rawKey);
    if (!key) continue;
    out.push([key, decodeComponent(rawValue)]);
  }
  return out;
}

/**
 * Extract a query string carried in the URL fragment, if any.
 * - "#4?utm_term=x" (ad redirect artefact): text after the first "?"
 * - "#utm_source=drift": whole fragment, unless it looks like an SPA route ("#/path")
 */
function fragmentQuery(hash: string): string | null {
  const fragment = hash.startsWith('#') ? hash.slice(1) : hash;
  if (!fragment) return null;
  const q = fragment.indexOf('?');
  if (q !== -1) return fragment.slice(q + 1) || null;
  if (fragment.includes('=') && !fragment.startsWith('/')) return fragment;
  return null;
}

function safeUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

/**
 * Query and fragment as the caller wrote them. URL#search is re-encoded by the
 * parser, which would change what a failed decode hands back.
 */
function splitRaw(raw: string): { query: string; fragment: string } {
  const hashAt = raw.indexOf('#');
  const beforeHash = hashAt === -1 ? raw : raw.slice(0, hashAt);
  const queryAt = beforeHash.indexOf('?');
  return {
    query: queryAt === -1 ? '' : beforeHash.slice(queryAt + 1),
    fragment: hashAt === -1 ? '' : raw.slice(hashAt + 1),
  };
}

function rawParams(raw: string): QueryParams {
  const { query, fragment } = splitRaw(raw);
  const pairs = parseQueryString(query);
  const fromFragment = fragmentQuery(fragment);
  if (fromFragment) pairs.push(...parseQueryString(fromFragment));
  return new QueryParams(pairs);
}

/**
 * Decompose a raw URL. Scheme, host and path need an absolute URL; query and
 * fragment parameters are read even when it is not one ("site.com/?gclid=x").
 *
 * @example
 * decomposeUrl('https://Shop.Example.com/p?q=a+b').host // 'shop.example.com'
 * decomposeUrl('not a url').host // ''
 */
export function decomposeUrl(raw: string | null | undefined): ParsedUrl {
  if (typeof raw !== 'string') return EMPTY;
  const trimmed = raw.trim();
  if (!trimmed) return EMPTY;

  const params = rawParams(trimmed);
  const url = safeUrl(trimmed);
  if (!url) return params.size > 0 ? { ...EMPTY, params } : EMPTY;

  return {
    scheme: url.protocol.replace(/:$/, '').toLowerCase(),
    host: url.hostname.toLowerCase(),
    path: url.pathname,
    params,
  };
}
