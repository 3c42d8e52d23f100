/**
 * Unit tests for lib/attribution/url-decomposer: lenient parsing, never throws.
 */

import { describe, expect, test } from 'vitest';
import { decomposeUrl, parseQueryString, QueryParams } from '@/lib/attribution/url-decomposer';

describe('decomposeUrl', () => {
  test('splits scheme, host and path; host is lowercased', () => {
    const parsed = decomposeUrl('https://Shop.Example.com/p/q?utm_source=google&x=1');
    expect(parsed.scheme).toBe('https');
    expect(parsed.host).toBe('shop.example.com');
    expect(parsed.path).toBe('/p/q');
    expect(parsed.params.get('utm_source')).toBe('google');
    expect(parsed.params.get('x')).toBe('1');
  });

  test('duplicate keys: last value wins, all values kept in order', () => {
    const { params } = decomposeUrl('https://site.com/?a=1&b=x&a=2');
    expect(params.get('a')).toBe('2');
    expect(params.getAll('a')).toEqual(['1', '2']);
    expect(params.keys()).toEqual(['a', 'b']);
  });

  test('segment without "=" is an empty value, not absent', () => {
    const { params } = decomposeUrl('https://site.com/?flag&b=2');
    expect(params.has('flag')).toBe(true);
    expect(params.get('flag')).toBe('');
  });

  test('plus is a space and percent escapes are decoded', () => {
    const { params } = decomposeUrl('https://site.com/?q=analytics+guide&k=caf%C3%A9&utm%5Fterm=x');
    expect(params.get('q')).toBe('analytics guide');
    expect(params.get('k')).toBe('café');
    expect(params.get('utm_term')).toBe('x');
  });

  test('malformed escape leaves the raw substring unchanged', () => {
    const { params } = decomposeUrl('https://site.com/?d=50%&e=a+b%');
    expect(params.get('d')).toBe('50%');
    expect(params.get('e')).toBe('a+b%');
  });

  test('undecodable values come back exactly as sent, not re-encoded', () => {
    const { params } = decomposeUrl('https://site.com/?utm_campaign=100% off&x=50%<x>#utm_content=10%');
    expect(params.get('utm_campaign')).toBe('100% off');
    expect(params.get('x')).toBe('50%<x>');
    expect(params.get('utm_content')).toBe('10%');
  });

  test('scheme-less input keeps its query parameters but no host', () => {
    const parsed = decomposeUrl('site.com/landing?gclid=abc&utm_term=a+b');
    expect(parsed.scheme).toBe('');
    expect(parsed.host).toBe('');
    expect(parsed.params.entries()).toEqual([
      ['gclid', 'abc'],
      ['utm_term', 'a b'],
    ]);
  });

  test('keys are case-sensitive', () => {
    const { params } = decomposeUrl('https://site.com/?GCLID=x');
    expect(params.get('gclid')).toBeUndefined();
    expect(params.get('GCLID')).toBe('x');
  });

  test('malformed input yields empty fields instead of throwing', () => {
    for (const raw of ['not a url', '', '   ', undefined, null]) {
      const parsed = decomposeUrl(raw);
      expect(parsed.scheme).toBe('');
      expect(parsed.host).toBe('');
      expect(parsed.path).toBe('');
      expect(parsed.params.size).toBe(0);
    }
  });

  test('fragment after "?" is parsed (ad redirect artefact)', () => {
    const { params } = decomposeUrl('https://site.com/?gclid=abc#4?utm_term=keyword');
    expect(params.get('gclid')).toBe('abc');
    expect(params.get('utm_term')).toBe('keyword');
  });

  test('fragment with parameters is parsed; SPA route fragment is not', () => {
    expect(decomposeUrl('https://site.com/#utm_source=drift').params.get('utm_source')).toBe('drift');
    expect(decomposeUrl('https://site.com/#/checkout=step').params.size).toBe(0);
  });

  test('fragment value comes last, so it wins on duplicates', () => {
    const { params } = decomposeUrl('https://site.com/?utm_source=a#utm_source=b');
    expect(params.get('utm_source')).toBe('b');
    expect(params.getAll('utm_source')).toEqual(['a', 'b']);
  });
});

describe('parseQueryString', () => {
  test('skips empty segments and keys', () => {
    expect(parseQueryString('?&a=1&&=2&b')).toEqual([
      ['a', '1'],
      ['b', ''],
    ]);
  });

  test('splits on the first "=" only', () => {
    expect(parseQueryString('next=/a?b=c')).toEqual([['next', '/a?b=c']]);
  });
});

describe('QueryParams', () => {
  test('is empty by default', () => {
    const params = new QueryParams();
    expect(params.size).toBe(0);
    expect(params.get('a')).toBeUndefined();
    expect(params.getAll('a')).toEqual([]);
  });
});
