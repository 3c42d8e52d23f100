#!/usr/bin/env npx tsx
/**
 * Classify one visit from the command line.
 *
 * Usage: npm run classify -- <landing-url> [referrer-url]
 * Reads ATTRIBUTION_* settings from .env.local / .env when present.
 */

import { config } from 'dotenv';

config({ path: '.env.local' });
config({ path: '.env' });

import { createAttributionRuntime } from '../lib/attribution/loader';
import { getErrorMessage } from '../lib/attribution/errors';

function main(): void {
  const [url, referrer] = process.argv.slice(2);
  if (!url) {
    console.error('Usage: npm run classify -- <landing-url> [referrer-url]');
    process.exit(1);
  }

  const { engine } = createAttributionRuntime();
  const result = engine.classify(url, referrer ?? null);
  console.log(JSON.stringify(result, null, 2));
}

try {
  main();
} catch (error) {
  console.error('Classification failed:', getErrorMessage(error));
  process.exit(1);
}
