/**
 * Unit tests for lib/attribution/config: env parsing and fail-fast validation.
 */

import { describe, expect, test } from 'vitest';
import { DEFAULT_REFERRERS_FILE, loadAttributionConfig } from '@/lib/attribution/config';
import { AttributionConfigError } from '@/lib/attribution/errors';

describe('loadAttributionConfig', () => {
  test('defaults', () => {
    expect(loadAttributionConfig({})).toEqual({
      referrersFile: DEFAULT_REFERRERS_FILE,
      publicSuffixFile: undefined,
      includePrivateSuffixes: false,
      includeTrackingParams: false,
    });
    expect(DEFAULT_REFERRERS_FILE.endsWith('referrers.json')).toBe(true);
  });

  test('reads paths and flags', () => {
    const config = loadAttributionConfig({
      ATTRIBUTION_REFERRERS_FILE: ' /srv/data/referrers.json ',
      ATTRIBUTION_PUBLIC_SUFFIX_FILE: '/srv/data/public_suffix_list.dat',
      ATTRIBUTION_PRIVATE_SUFFIXES: 'TRUE',
      ATTRIBUTION_TRACKING_PARAMS: '1',
    });
    expect(config).toEqual({
      referrersFile: '/srv/data/referrers.json',
      publicSuffixFile: '/srv/data/public_suffix_list.dat',
      includePrivateSuffixes: true,
      includeTrackingParams: true,
    });
  });

  test('blank values fall back to defaults', () => {
    const config = loadAttributionConfig({ ATTRIBUTION_REFERRERS_FILE: '   ', ATTRIBUTION_TRACKING_PARAMS: '' });
    expect(config.referrersFile).toBe(DEFAULT_REFERRERS_FILE);
    expect(config.includeTrackingParams).toBe(false);
  });

  test('false-ish flags', () => {
    const config = loadAttributionConfig({ ATTRIBUTION_PRIVATE_SUFFIXES: 'false', ATTRIBUTION_TRACKING_PARAMS: '0' });
    expect(config.includePrivateSuffixes).toBe(false);
    expect(config.includeTrackingParams).toBe(false);
  });

  test('an unrecognised flag value fails fast', () => {
    try {
      loadAttributionConfig({ ATTRIBUTION_TRACKING_PARAMS: 'yes' });
      expect.unreachable('expected a config error');
    } catch (error) {
      expect(error).toBeInstanceOf(AttributionConfigError);
      if (error instanceof AttributionConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^ATTRIBUTION_TRACKING_PARAMS: /);
        expect(error.message).toMatch(/^Invalid attribution config: ATTRIBUTION_TRACKING_PARAMS: /);
      }
    }
  });
});
