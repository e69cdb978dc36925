/**
 * Testing Utilities
 *
 * Mock factories for tests of applications built on the app server.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@crossurls/app-server/testing';
 *
 * const logger = createMockLogger();
 * expect(logger.info).toHaveBeenCalledWith('Server listening', { port: 4000 });
 * ```
 */

import { vi } from 'vitest';
import type { StructuredLogger } from './logger.js';

/**
 * Creates a logger whose methods are spies, so tests stay quiet and can
 * assert on what was logged.
 */
export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies StructuredLogger;
}
