/**
 * Test setup - FAQ RAG
 */

import { afterEach, vi } from 'vitest';
import { env } from '../env';

if (env.NODE_ENV !== 'test') {
  throw new Error('Tests must run with NODE_ENV=test');
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
