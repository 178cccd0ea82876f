/**
 * Root test setup file
 *
 * Silences the shared winston logger so test output stays readable.
 * Tests that exercise the logger itself import it by relative path.
 */

import { vi } from 'vitest';

vi.mock('@tradekit/utils', async () => {
  const actual = await vi.importActual<typeof import('@tradekit/utils')>('@tradekit/utils');
  const silent = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    child: silentChild,
  };
  function silentChild(): Record<string, unknown> {
    return silent;
  }
  return {
    ...actual,
    logger: silent,
    createLogger: () => silent,
    configureLogging: vi.fn(),
  };
});
