/**
 * Attribution runtime configuration from env (fail-fast on invalid values).
 *
 * - ATTRIBUTION_REFERRERS_FILE: referrer dataset JSON. Default: bundled data/referrers.json.
 * - ATTRIBUTION_PUBLIC_SUFFIX_FILE: public_suffix_list.dat. Default: list bundled with tldts.
 * - ATTRIBUTION_PRIVATE_SUFFIXES: treat PSL private domains (github.io, ...) as suffixes. Default: false.
 * - ATTRIBUTION_TRACKING_PARAMS: attach tracking_params to results. Default: false.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { AttributionConfigError } from './errors';

export const DEFAULT_REFERRERS_FILE = fileURLToPath(new URL('../../data/referrers.json', import.meta.url));

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optionalPath = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalFlag = z.preprocess(
  (v) => {
    const s = blankToUndefined(v);
    return typeof s === 'string' ? s.trim().toLowerCase() : s;
  },
  z.enum(['true', 'false', '1', '0']).optional()
);

export const AttributionEnvSchema = z.object({
  ATTRIBUTION_REFERRERS_FILE: optionalPath,
  ATTRIBUTION_PUBLIC_SUFFIX_FILE: optionalPath,
  ATTRIBUTION_PRIVATE_SUFFIXES: optionalFlag,
  ATTRIBUTION_TRACKING_PARAMS: optionalFlag,
});

export interface AttributionConfig {
  referrersFile: string;
  /** Absent: use the list bundled with tldts. */
  publicSuffixFile?: string;
  includePrivateSuffixes: boolean;
  includeTrackingParams: boolean;
}

function isOn(flag: string | undefined): boolean {
  return flag === 'true' || flag === '1';
}

export function loadAttributionConfig(env: Record<string, string | undefined> = process.env): AttributionConfig {
  const parsed = AttributionEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new AttributionConfigError(`Invalid attribution config: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    referrersFile: e.ATTRIBUTION_REFERRERS_FILE ?? DEFAULT_REFERRERS_FILE,
    publicSuffixFile: e.ATTRIBUTION_PUBLIC_SUFFIX_FILE,
    includePrivateSuffixes: isOn(e.ATTRIBUTION_PRIVATE_SUFFIXES),
    includeTrackingParams: isOn(e.ATTRIBUTION_TRACKING_PARAMS),
  };
}
