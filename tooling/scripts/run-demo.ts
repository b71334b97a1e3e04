#!/usr/bin/env tsx
/**
 * Run the Mini Venmo demo scenario and print Bobby's feed
 * Logs go to stderr so stdout carries only the feed.
 */

import { MiniVenmo, loadMiniVenmoConfig } from '@repo/core';
import { createLogger } from '@repo/observability';

function runDemo() {
  const config = loadMiniVenmoConfig();
  const miniVenmo = new MiniVenmo({
    acceptedCardNumbers: config.acceptedCardNumbers,
    logger: createLogger(undefined, process.stderr),
  });
  miniVenmo.runDemo();
}

try {
  runDemo();
} catch (error) {
  console.error('Demo failed:', error);
  process.exit(1);
}
