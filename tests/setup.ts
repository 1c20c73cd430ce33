/**
 * Vitest Global Test Setup
 * @module tests/setup
 */

import { afterEach } from 'vitest';

import { resetLogger } from '@/logging';

// ============================================================================
// Environment Setup
// ============================================================================

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';

afterEach(() => {
  resetLogger();
});
