/**
 * Click-ID extraction.
 *
 * CLICK_ID_RULES is the priority policy: evaluated top to bottom, first present
 * parameter wins. Reordering rows changes priority; no branching logic lives here.
 * Google Ads family first, then Meta, Microsoft, TikTok, then the long tail.
 *
 * kind 'click'  → a per-click identifier, reported as click_id / click_id_type
 * kind 'signal' → an ad-platform marker that only drives platform inference
 */

import type { QueryParams } from './url-decomposer';
import type { ClickIdMatch, PlatformInference } from './types';

export type ClickIdKind = 'click' | 'signal';

export interface ClickIdRule {
  /** Tag reported as click_id_type. */
  type: string;
  /** Query parameter names, case-sensitive, checked in order. */
  params: readonly string[];
  kind: ClickIdKind;
  platform?: PlatformInference;
}

const GOOGLE_CPC: PlatformInference = { source: 'google', medium: 'cpc' };

export const CLICK_ID_RULES: readonly ClickIdRule[] = Object.freeze([
  { type: 'gclid', params: ['gclid'], kind: 'click', platform: GOOGLE_CPC },
  { type: 'gclsrc', params: ['gclsrc'], kind: 'signal', platform: GOOGLE_CPC },
  { type: 'gbraid', params: ['gbraid'], kind: 'click', platform: GOOGLE_CPC },
  { type: 'wbraid', params: ['wbraid'], kind: 'click', platform: GOOGLE_CPC },
  { type: 'gad_source', params: ['gad_source'], kind: 'signal', platform: GOOGLE_CPC },
  { type: 'gad_campaignid', params: ['gad_campaignid'], kind: 'signal', platform: GOOGLE_CPC },
  { type: 'srsltid', params: ['srsltid'], kind: 'signal', platform: GOOGLE_CPC },
  { type: 'fbclid', params: ['fbclid'], kind: 'click', platform: { source: 'facebook', medium: 'cpc' } },
  { type: 'msclkid', params: ['msclkid'], kind: 'click', platform: { source: 'bing', medium: 'cpc' } },
  { type: 'ttclid', params: ['ttclid'], kind: 'click', platform: { source: 'tiktok', medium: 'cpc' } },
  { type: 'li_fat_id', params: ['li_fat_id'], kind: 'click', platform: { source: 'linkedin', medium: 'cpc' } },
  { type: 'twclid', params: ['twclid'], kind: 'click', platform: { source: 'twitter', medium: 'cpc' } },
  { type: 'igshid', params: ['igshid'], kind: 'signal', platform: { source: 'instagram', medium: 'social' } },
  { type: 'sccid', params: ['ScCid', 'sccid'], kind: 'signal', platform: { source: 'snapchat', medium: 'cpc' } },
  { type: 'epik', params: ['epik'], kind: 'signal', platform: { source: 'pinterest', medium: 'social' } },
  { type: 'rdt_cid', params: ['rdt_cid'], kind: 'click', platform: { source: 'reddit', medium: 'cpc' } },
  { type: 'obclick_id', params: ['obclick_id'], kind: 'click', platform: { source: 'outbrain', medium: 'cpc' } },
  { type: 'obOrigUrl', params: ['obOrigUrl'], kind: 'signal' },
  { type: 'ttd_uuid', params: ['ttd_uuid'], kind: 'signal' },
  { type: 'yclid', params: ['yclid'], kind: 'click', platform: { source: 'yahoo', medium: 'cpc' } },
  { type: 'dclid', params: ['dclid'], kind: 'click', platform: { source: 'doubleclick', medium: 'display' } },
  { type: 'tblci', params: ['tblci'], kind: 'click', platform: { source: 'taboola', medium: 'cpc' } },
  { type: 'irclid', params: ['irclid'], kind: 'click', platform: { source: 'impact', medium: 'affiliate' } },
  { type: 'mc_cid', params: ['mc_cid'], kind: 'signal', platform: { source: 'mailchimp', medium: 'email' } },
  { type: 'mc_eid', params: ['mc_eid'], kind: 'signal', platform: { source: 'mailchimp', medium: 'email' } },
  { type: 'ml_subscriber_hash', params: ['ml_subscriber_hash'], kind: 'signal', platform: { source: 'mailerlite', medium: 'email' } },
] satisfies ClickIdRule[]);

/** First non-empty value among a rule's parameter names. */
function ruleValue(rule: ClickIdRule, params: QueryParams): string | null {
  for (const name of rule.params) {
    const v = params.get(name)?.trim();
    if (v) return v;
  }
  return null;
}

/**
 * Scan click-ID rules in priority order.
 * - inferredPlatform: from the first matching rule that carries one
 * - clickId / clickIdType: from the first matching 'click' rule
 * Returns null when no rule matches.
 */
export function extractClickId(params: QueryParams, rules: readonly ClickIdRule[] = CLICK_ID_RULES): ClickIdMatch | null {
  const match: ClickIdMatch = {};
  let matched = false;

  for (const rule of rules) {
    const value = ruleValue(rule, params);
    if (value === null) continue;
    matched = true;

    if (!match.inferredPlatform && rule.platform) {
      match.inferredPlatform = { ...rule.platform };
    }
    if (!match.clickId && rule.kind === 'click') {
      match.clickId = value;
      match.clickIdType = rule.type;
    }
    if (match.clickId && match.inferredPlatform) break;
  }

  return matched ? match : null;
}

/** Google Ads campaign id; surfaced independently of click-ID priority. */
export function campaignIdFrom(params: QueryParams): string | undefined {
  return params.get('gad_campaignid')?.trim() || undefined;
}
