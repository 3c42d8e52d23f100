/**
 * Referrer Knowledge Base: immutable index of referrer domains → (source, medium).
 *
 * Built once from an ordered entry list (last write wins on duplicate domains) and
 * only read afterwards. Lookup is exact per domain: the full host first, then each
 * parent domain down to the registrable root. No fuzzy matching.
 */

import type { Domain, ReferrerClassification, ReferrerEntry, ReferrerMedium } from './types';

export class ReferrerKnowledgeBase {
  private readonly index: ReadonlyMap<string, ReferrerClassification>;

  constructor(entries: Iterable<ReferrerEntry>) {
    const index = new Map<string, ReferrerClassification>();
    for (const entry of entries) {
      const key = entry.domain.trim().toLowerCase();
      if (!key) continue;
      index.set(
        key,
        Object.freeze({
          source: entry.source,
          medium: entry.medium,
          termParams: Object.freeze([...(entry.parameters ?? [])]),
        })
      );
    }
    this.index = index;
  }

  get size(): number {
    return this.index.size;
  }

  /** Exact lookup of one domain key (case-insensitive). */
  get(domain: string): ReferrerClassification | null {
    return this.index.get(domain.trim().toLowerCase()) ?? null;
  }

  /**
   * Classify a normalized referrer domain. Returns null for unknown domains.
   *
   * @example
   * kb.classify({ fullHost: 'www.google.co.uk', registrableRoot: 'google.co.uk' })
   */
  classify(domain: Domain): ReferrerClassification | null {
    const host = domain.fullHost.toLowerCase();
    const root = domain.registrableRoot.toLowerCase();
    if (!host) return null;

    let candidate = host;
    for (;;) {
      const hit = this.index.get(candidate);
      if (hit) return hit;
      if (!root || candidate === root || !candidate.endsWith('.' + root)) break;
      candidate = candidate.slice(candidate.indexOf('.') + 1);
    }
    return null;
  }
}

/**
 * Nested layout of the open referrer database:
 * medium → provider name → { domains, parameters }.
 */
export type ReferrerDatabase = Record<string, Record<string, { domains?: string[]; parameters?: string[] }>>;

const DATABASE_MEDIUMS: ReadonlyMap<string, ReferrerMedium> = new Map<string, ReferrerMedium>([
  ['search', 'search'],
  ['social', 'social'],
  ['email', 'email'],
  ['paid', 'cpc'],
  ['cpc', 'cpc'],
  ['unknown', 'referral'],
  ['referral', 'referral'],
]);

/**
 * Flatten the nested referrer database into ordered entries.
 * Mediums outside the known set are skipped.
 */
export function fromReferrerDatabase(db: ReferrerDatabase): ReferrerEntry[] {
  const entries: ReferrerEntry[] = [];
  for (const [rawMedium, providers] of Object.entries(db)) {
    const medium = DATABASE_MEDIUMS.get(rawMedium.toLowerCase());
    if (!medium) continue;
    for (const [source, config] of Object.entries(providers)) {
      for (const domain of config.domains ?? []) {
        entries.push({ domain, source, medium, parameters: config.parameters ?? [] });
      }
    }
  }
  return entries;
}
