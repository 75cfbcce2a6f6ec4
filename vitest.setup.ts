/**
 * Centralized Vitest setup.
 *
 * Logs go to stderr through the telemetry logger; keep them quiet unless a
 * test turns them back on with `configureLogger`.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { configureLogger } from './src/telemetry/logger.js';

beforeEach(() => {
  configureLogger({ level: 'silent' });
});

afterEach(() => {
  vi.restoreAllMocks();
});
