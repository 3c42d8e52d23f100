/**
 * Loads attribution data from disk and publishes it as immutable snapshots.
 * This is the only attribution module that touches the filesystem; the engine
 * and its collaborators only see the in-memory result.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { logError, logInfo } from '@/lib/logging/logger';
import { loadAttributionConfig, type AttributionConfig } from './config';
import { DomainNormalizer } from './domain-normalizer';
import { AttributionEngine } from './engine';
import { KnowledgeBaseLoadError, MissingSuffixDataError, getErrorMessage } from './errors';
import { PublicSuffixRules, bundledSuffixTable, type SuffixTable } from './public-suffix';
import { ReferrerKnowledgeBase, fromReferrerDatabase } from './referrer-knowledge-base';
import { SnapshotRef, createSnapshot, type AttributionSnapshot } from './snapshot';
import { REFERRER_MEDIUMS, type ReferrerEntry } from './types';

export const ReferrerEntrySchema = z.object({
  domain: z.string().trim().min(1),
  source: z.string().trim().min(1),
  medium: z.enum(REFERRER_MEDIUMS),
  parameters: z.array(z.string()).optional(),
});

/** Flat dataset: ordered { domain, source, medium } rows. */
export const ReferrerDatasetSchema = z.object({
  version: z.string().optional(),
  entries: z.array(ReferrerEntrySchema),
});

/** Nested open referrer database layout: medium → provider → { domains, parameters }. */
export const ReferrerDatabaseSchema = z.record(
  z.string(),
  z.record(
    z.string(),
    z.object({
      domains: z.array(z.string()).optional(),
      parameters: z.array(z.string()).optional(),
    })
  )
);

export interface ReferrerDataset {
  version?: string;
  entries: ReferrerEntry[];
}

/**
 * Validate a parsed JSON value as a referrer dataset (flat or nested layout).
 */
export function parseReferrerDataset(raw: unknown, sourcePath?: string): ReferrerDataset {
  const flat = ReferrerDatasetSchema.safeParse(raw);
  if (flat.success) return flat.data;

  const nested = ReferrerDatabaseSchema.safeParse(raw);
  if (nested.success) return { entries: fromReferrerDatabase(nested.data) };

  const issue = flat.error.issues[0];
  const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unrecognised layout';
  throw new KnowledgeBaseLoadError(`Invalid referrer dataset (${where})`, sourcePath);
}

function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new KnowledgeBaseLoadError(`Cannot read referrer dataset: ${getErrorMessage(error)}`, path, { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new KnowledgeBaseLoadError(`Referrer dataset is not valid JSON: ${getErrorMessage(error)}`, path, { cause: error });
  }
}

export function loadKnowledgeBase(path: string): { knowledgeBase: ReferrerKnowledgeBase; version?: string } {
  const dataset = parseReferrerDataset(readJsonFile(path), path);
  const knowledgeBase = new ReferrerKnowledgeBase(dataset.entries);
  logInfo('referrer dataset loaded', {
    component: 'loader',
    path,
    dataset_version: dataset.version,
    entries: knowledgeBase.size,
  });
  return { knowledgeBase, version: dataset.version };
}

/**
 * Suffix table from config. A configured file that cannot be read is fatal:
 * without it internal-vs-external detection is wrong for every call.
 */
export function loadSuffixTable(config: Pick<AttributionConfig, 'publicSuffixFile' | 'includePrivateSuffixes'>): SuffixTable {
  if (!config.publicSuffixFile) {
    return bundledSuffixTable({ allowPrivateDomains: config.includePrivateSuffixes });
  }

  let text: string;
  try {
    text = readFileSync(config.publicSuffixFile, 'utf-8');
  } catch (error) {
    throw new MissingSuffixDataError(`Cannot read public suffix list: ${getErrorMessage(error)}`, config.publicSuffixFile);
  }
  const rules = PublicSuffixRules.parse(text, {
    includePrivate: config.includePrivateSuffixes,
    sourcePath: config.publicSuffixFile,
  });
  logInfo('public suffix list loaded', { component: 'loader', path: config.publicSuffixFile, rules: rules.size });
  return rules;
}

export function loadSnapshot(config: AttributionConfig): AttributionSnapshot {
  const normalizer = new DomainNormalizer(loadSuffixTable(config));
  const { knowledgeBase, version } = loadKnowledgeBase(config.referrersFile);
  return createSnapshot(knowledgeBase, normalizer, version);
}

export interface AttributionRuntime {
  engine: AttributionEngine;
  snapshots: SnapshotRef;
  /** Load a fresh snapshot and publish it. On failure the current snapshot stays in place. */
  reload(): AttributionSnapshot;
}

export function createAttributionRuntime(config: AttributionConfig = loadAttributionConfig()): AttributionRuntime {
  const snapshots = new SnapshotRef(loadSnapshot(config));
  const engine = new AttributionEngine(snapshots, { includeTrackingParams: config.includeTrackingParams });

  return {
    engine,
    snapshots,
    reload() {
      try {
        const next = loadSnapshot(config);
        snapshots.publish(next);
        return next;
      } catch (error) {
        logError('attribution reload failed; keeping current snapshot', {
          component: 'loader',
          error: getErrorMessage(error),
        });
        throw error;
      }
    },
  };
}
