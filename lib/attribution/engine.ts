/**
 * Attribution Engine
 *
 * Deterministic source/medium classification for a landing URL + optional referrer.
 *
 * Stages (each only fills fields the earlier stages left unset):
 * 1. UTM tags (utm_source wins over everything below)
 * 2. Click IDs (platform inference; click_id / campaign_id always recorded)
 * 3. Referrer (internal navigation, knowledge base, or plain referral)
 * 4. Direct
 */

import { logWarn } from '@/lib/logging/logger';
import { CLICK_ID_RULES, campaignIdFrom, extractClickId } from './click-id-extractor';
import { getErrorMessage } from './errors';
import type { AttributionSnapshot, SnapshotSource } from './snapshot';
import type { AttributionResult, ParsedUrl } from './types';
import { decomposeUrl, type QueryParams } from './url-decomposer';

export const DIRECT_SOURCE = '(direct)';
export const NONE_MEDIUM = '(none)';
export const INTERNAL_SOURCE = '(internal)';
export const INTERNAL_MEDIUM = 'internal';
export const REFERRAL_MEDIUM = 'referral';

const UTM_PARAMS = ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content', 'utm_id'] as const;
const TELEGRAM_START_PARAMS = ['tgWebAppStartParam', 'tgwebappstartparam'] as const;
const OTHER_TRACKING_PARAMS = ['pk_campaign', 'pk_source', 'pk_medium', ...TELEGRAM_START_PARAMS] as const;

/** Canonical order of recognised tracking parameters in tracking_params. */
export const TRACKING_PARAMS: readonly string[] = Object.freeze([
  ...UTM_PARAMS,
  ...CLICK_ID_RULES.flatMap((rule) => rule.params),
  ...OTHER_TRACKING_PARAMS,
]);

type Draft = Partial<Omit<AttributionResult, 'tracking_params'>>;

const DRAFT_KEYS = ['source', 'medium', 'term', 'click_id', 'click_id_type', 'campaign_id', 'campaign', 'content'] as const;

export interface ClassifyOptions {
  /** Attach the recognised tracking parameters as tracking_params. Default false. */
  includeTrackingParams?: boolean;
}

function param(params: QueryParams, key: string): string | undefined {
  return params.get(key)?.trim() || undefined;
}

/** Fill only the keys that are still unset. */
function fill(draft: Draft, values: Draft): void {
  for (const key of DRAFT_KEYS) {
    const value = values[key];
    if (value && !draft[key]) draft[key] = value;
  }
}

/**
 * Telegram mini-app links carry tags inside one parameter,
 * e.g. tgWebAppStartParam=utm_source-telegram_utm_medium-cpc
 */
function telegramTags(params: QueryParams): { source: string; medium: string } | null {
  for (const name of TELEGRAM_START_PARAMS) {
    const raw = params.get(name);
    if (!raw) continue;
    const source = /utm_source-([^_]+)/.exec(raw)?.[1];
    const medium = /utm_medium-([^_]+)/.exec(raw)?.[1];
    if (source && medium) return { source, medium };
  }
  return null;
}

function applyUtmStage(draft: Draft, params: QueryParams): void {
  const utmSource = param(params, 'utm_source');
  const utmMedium = param(params, 'utm_medium');

  if (utmSource) {
    fill(draft, { source: utmSource, medium: utmMedium || NONE_MEDIUM });
  } else {
    if (utmMedium) fill(draft, { medium: utmMedium });
    const tags = telegramTags(params);
    if (tags) fill(draft, tags);
  }

  fill(draft, {
    term: param(params, 'utm_term'),
    campaign: param(params, 'utm_campaign'),
    content: param(params, 'utm_content'),
  });
}

function applyClickIdStage(draft: Draft, params: QueryParams): void {
  const match = extractClickId(params);
  if (match) {
    if (match.inferredPlatform) fill(draft, match.inferredPlatform);
    fill(draft, { click_id: match.clickId, click_id_type: match.clickIdType });
  }
  // gad_campaignid first, utm_id as the fallback campaign id
  fill(draft, { campaign_id: campaignIdFrom(params) ?? param(params, 'utm_id') });
}

/** First referrer query value whose name (case-insensitive) is a search-term parameter. */
function searchTerm(referrer: ParsedUrl, termParams: readonly string[]): string | undefined {
  if (termParams.length === 0) return undefined;
  const wanted = new Set(termParams.map((p) => p.toLowerCase()));
  for (const [key, value] of referrer.params.entries()) {
    if (wanted.has(key.toLowerCase()) && value.trim()) return value.trim();
  }
  return undefined;
}

function applyReferrerStage(draft: Draft, landing: ParsedUrl, rawReferrer: string | null | undefined, snapshot: AttributionSnapshot): void {
  if (draft.source) return;

  const referrer = decomposeUrl(rawReferrer);
  if (!referrer.host || (referrer.scheme !== 'http' && referrer.scheme !== 'https')) return;

  const { normalizer, knowledgeBase } = snapshot;
  const refDomain = normalizer.normalize(referrer.host);

  if (landing.host && normalizer.isSameSite(landing.host, referrer.host)) {
    fill(draft, { source: INTERNAL_SOURCE, medium: INTERNAL_MEDIUM });
    return;
  }

  const classification = knowledgeBase.classify(refDomain);
  if (!classification) {
    fill(draft, { source: refDomain.registrableRoot, medium: REFERRAL_MEDIUM });
    return;
  }

  fill(draft, {
    source: classification.source,
    medium: classification.medium === 'none' ? NONE_MEDIUM : classification.medium,
  });
  if (classification.medium === 'search') {
    fill(draft, { term: searchTerm(referrer, classification.termParams) });
  }
}

function trackingParams(params: QueryParams): Record<string, string> | undefined {
  const out: Record<string, string> = {};
  for (const name of TRACKING_PARAMS) {
    const value = param(params, name);
    if (value) out[name] = value;
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/** Assemble the final record in a fixed key order, omitting unset fields. */
function finalize(draft: Draft, params: QueryParams, options?: ClassifyOptions): AttributionResult {
  // A lone utm_medium only stands when some stage named a source
  const result: AttributionResult = draft.source
    ? { source: draft.source, medium: draft.medium || NONE_MEDIUM }
    : { source: DIRECT_SOURCE, medium: NONE_MEDIUM };
  for (const key of DRAFT_KEYS.slice(2)) {
    const value = draft[key];
    if (value) result[key] = value;
  }
  if (options?.includeTrackingParams) {
    const tracked = trackingParams(params);
    if (tracked) result.tracking_params = tracked;
  }
  return result;
}

/**
 * Classify one visit against a fixed snapshot. Pure and synchronous; never throws.
 *
 * @param url - landing URL (may carry utm_* and click-id params)
 * @param referrer - document.referrer; empty/absent means no referrer
 */
export function classifyTraffic(
  url: string,
  referrer: string | null | undefined,
  snapshot: AttributionSnapshot,
  options?: ClassifyOptions
): AttributionResult {
  try {
    const landing = decomposeUrl(url);
    const draft: Draft = {};

    applyUtmStage(draft, landing.params);
    applyClickIdStage(draft, landing.params);
    applyReferrerStage(draft, landing, referrer, snapshot);

    return finalize(draft, landing.params, options);
  } catch (error) {
    logWarn('attribution classification failed; falling back to direct', {
      component: 'engine',
      error: getErrorMessage(error),
    });
    return { source: DIRECT_SOURCE, medium: NONE_MEDIUM };
  }
}

export class AttributionEngine {
  constructor(
    private readonly snapshots: SnapshotSource,
    private readonly options: ClassifyOptions = {}
  ) {}

  classify(url: string, referrer?: string | null): AttributionResult {
    return classifyTraffic(url, referrer, this.snapshots.current(), this.options);
  }
}
