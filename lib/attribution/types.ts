/**
 * Shared types for traffic attribution.
 */

import type { QueryParams } from './url-decomposer';

export interface ParsedUrl {
  /** Lowercase scheme without the trailing colon (e.g. "https"). */
  scheme: string;
  /** Lowercase hostname; IPv6 keeps its brackets. */
  host: string;
  path: string;
  params: QueryParams;
}

export interface Domain {
  fullHost: string;
  /** Public suffix + one label (eTLD+1). Always a suffix of fullHost. */
  registrableRoot: string;
}

export const REFERRER_MEDIUMS = ['search', 'social', 'email', 'cpc', 'referral', 'internal', 'none'] as const;

export type ReferrerMedium = (typeof REFERRER_MEDIUMS)[number];

export interface ReferrerClassification {
  readonly source: string;
  readonly medium: ReferrerMedium;
  /** Query parameter names that carry the search term (search engines only). */
  readonly termParams: readonly string[];
}

/** One row of the referrer dataset. */
export interface ReferrerEntry {
  domain: string;
  source: string;
  medium: ReferrerMedium;
  parameters?: string[];
}

export type PlatformInference = {
  source: string;
  medium: string;
};

export interface ClickIdMatch {
  clickId?: string;
  clickIdType?: string;
  inferredPlatform?: PlatformInference;
}

/**
 * Final attribution record. Fields the cascade did not derive are omitted.
 */
export interface AttributionResult {
  source: string;
  medium: string;
  term?: string;
  click_id?: string;
  click_id_type?: string;
  campaign_id?: string;
  campaign?: string;
  content?: string;
  /** Recognised tracking parameters on the landing URL (non-empty values only). */
  tracking_params?: Record<string, string>;
}
