/**
 * Immutable attribution data snapshot and the reference used to swap it.
 *
 * Readers call current() once per classification and keep that snapshot for the
 * whole call; publish() replaces the reference for subsequent calls only.
 */

import { logInfo } from '@/lib/logging/logger';
import type { DomainNormalizer } from './domain-normalizer';
import type { ReferrerKnowledgeBase } from './referrer-knowledge-base';

export interface AttributionSnapshot {
  readonly knowledgeBase: ReferrerKnowledgeBase;
  readonly normalizer: DomainNormalizer;
  /** Dataset version label, when the source file declares one. */
  readonly version?: string;
  readonly loadedAt: string;
}

export interface SnapshotSource {
  current(): AttributionSnapshot;
}

export function createSnapshot(
  knowledgeBase: ReferrerKnowledgeBase,
  normalizer: DomainNormalizer,
  version?: string
): AttributionSnapshot {
  return Object.freeze({
    knowledgeBase,
    normalizer,
    version,
    loadedAt: new Date().toISOString(),
  });
}

export class SnapshotRef implements SnapshotSource {
  private snapshot: AttributionSnapshot;

  constructor(initial: AttributionSnapshot) {
    this.snapshot = initial;
  }

  current(): AttributionSnapshot {
    return this.snapshot;
  }

  /** Swap in a new snapshot; returns the one it replaced. */
  publish(next: AttributionSnapshot): AttributionSnapshot {
    const previous = this.snapshot;
    this.snapshot = next;
    logInfo('attribution snapshot published', {
      component: 'snapshot',
      dataset_version: next.version,
      entries: next.knowledgeBase.size,
      suffix_source: next.normalizer.suffixSource,
    });
    return previous;
  }
}
