/**
 * Test setup - KubeQuery Backend
 * Pure unit tests: no database, no search cluster, no network.
 */

import { afterEach, beforeAll, vi } from 'vitest';
import { env } from '@/env';

beforeAll(() => {
  if (env.NODE_ENV !== 'test') {
    throw new Error('Tests must run with NODE_ENV=test');
  }
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});
