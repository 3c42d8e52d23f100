/**
 * Public Suffix List (PSL) rule sets.
 *
 * Two sources of suffix data:
 * - the list bundled with tldts (default, refreshed with the dependency)
 * - an externally supplied public_suffix_list.dat, parsed by PublicSuffixRules
 *
 * Both are read-only once built.
 */

import { getPublicSuffix } from 'tldts';
import { MissingSuffixDataError } from './errors';

/** Longest matching public suffix for a host, or null when no listed rule applies. */
export interface SuffixTable {
  readonly name: string;
  publicSuffix(host: string): string | null;
}

export interface ParseSuffixOptions {
  /** Include the PRIVATE DOMAINS section (github.io, blogspot.com, ...). Default false. */
  includePrivate?: boolean;
  /** Where the text came from; used in error messages. */
  sourcePath?: string;
}

const PRIVATE_SECTION_START = '===BEGIN PRIVATE DOMAINS===';

/**
 * Rule engine for the public_suffix_list.dat format (exact, "*." wildcard and "!" exception rules).
 */
export class PublicSuffixRules implements SuffixTable {
  readonly name = 'public-suffix-file';

  private constructor(
    private readonly exact: ReadonlySet<string>,
    private readonly wildcard: ReadonlySet<string>,
    private readonly exception: ReadonlySet<string>
  ) {}

  get size(): number {
    return this.exact.size + this.wildcard.size + this.exception.size;
  }

  static parse(text: string, options?: ParseSuffixOptions): PublicSuffixRules {
    const includePrivate = options?.includePrivate === true;
    const exact = new Set<string>();
    const wildcard = new Set<string>();
    const exception = new Set<string>();

    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line.includes(PRIVATE_SECTION_START) && !includePrivate) break;
      if (!line || line.startsWith('//')) continue;

      // Rules end at the first whitespace
      const rule = line.split(/\s+/)[0].toLowerCase();
      if (rule.startsWith('!')) {
        exception.add(rule.slice(1));
      } else if (rule.startsWith('*.')) {
        wildcard.add(rule.slice(2));
      } else {
        exact.add(rule);
      }
    }

    if (exact.size + wildcard.size + exception.size === 0) {
      throw new MissingSuffixDataError('Public suffix list contains no rules', options?.sourcePath);
    }
    return new PublicSuffixRules(exact, wildcard, exception);
  }

  publicSuffix(host: string): string | null {
    const labels = host.toLowerCase().split('.');

    // Longest candidate first; the first hit is the longest match
    for (let i = 0; i < labels.length; i++) {
      const candidate = labels.slice(i).join('.');
      const parent = labels.slice(i + 1).join('.');

      if (this.exception.has(candidate)) {
        return parent || null;
      }
      if (this.exact.has(candidate)) {
        return candidate;
      }
      if (parent && this.wildcard.has(parent)) {
        return candidate;
      }
    }
    return null;
  }
}

export interface BundledSuffixOptions {
  allowPrivateDomains?: boolean;
}

/**
 * Suffix table backed by the list compiled into tldts.
 */
export function bundledSuffixTable(options?: BundledSuffixOptions): SuffixTable {
  const allowPrivateDomains = options?.allowPrivateDomains === true;
  return Object.freeze({
    name: allowPrivateDomains ? 'tldts+private' : 'tldts',
    publicSuffix(host: string): string | null {
      return getPublicSuffix(host, { allowPrivateDomains });
    },
  });
}
