/**
 * Traffic attribution: public surface.
 */

export type {
  AttributionResult,
  ClickIdMatch,
  Domain,
  ParsedUrl,
  PlatformInference,
  ReferrerClassification,
  ReferrerEntry,
  ReferrerMedium,
} from './types';
export { REFERRER_MEDIUMS } from './types';

export { QueryParams, decomposeUrl, decodeComponent, parseQueryString } from './url-decomposer';
export { PublicSuffixRules, bundledSuffixTable, type SuffixTable } from './public-suffix';
export { DomainNormalizer } from './domain-normalizer';
export { ReferrerKnowledgeBase, fromReferrerDatabase, type ReferrerDatabase } from './referrer-knowledge-base';
export { CLICK_ID_RULES, extractClickId, campaignIdFrom, type ClickIdRule } from './click-id-extractor';
export {
  AttributionEngine,
  classifyTraffic,
  TRACKING_PARAMS,
  DIRECT_SOURCE,
  NONE_MEDIUM,
  INTERNAL_SOURCE,
  INTERNAL_MEDIUM,
  REFERRAL_MEDIUM,
  type ClassifyOptions,
} from './engine';
export { SnapshotRef, createSnapshot, type AttributionSnapshot, type SnapshotSource } from './snapshot';
export {
  createAttributionRuntime,
  loadKnowledgeBase,
  loadSnapshot,
  loadSuffixTable,
  parseReferrerDataset,
  type AttributionRuntime,
  type ReferrerDataset,
} from './loader';
export { loadAttributionConfig, DEFAULT_REFERRERS_FILE, type AttributionConfig } from './config';
export { MissingSuffixDataError, KnowledgeBaseLoadError, AttributionConfigError } from './errors';
