/**
 * Centralized Vitest setup for bibsearch.
 *
 * Routes the logger to the discard sink so worker failures exercised by the
 * tests do not flood the reporter. Tests that assert on logging install their
 * own spies or sinks.
 */

import { afterEach, beforeEach } from 'vitest';
import { configureLogger, resetLogger } from './src/telemetry/logger.js';

beforeEach(() => {
  if (process.env.BIBSEARCH_TEST_LOGS !== 'true') {
    configureLogger({ sink: () => {} });
  }
});

afterEach(() => {
  resetLogger();
});
