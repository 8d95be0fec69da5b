import { afterEach } from 'vitest';
import { resetConfig } from '@spacekit/core';

/**
 * Global setup for the Vitest environment
 *
 * Tests run with the logger silenced unless SPACEKIT_DEBUG=1 is set, and every
 * test starts from the default configuration (unseeded RNG, default log level).
 */

if (!process.env.SPACEKIT_DEBUG) {
  process.env.SPACEKIT_QUIET = '1';
}

resetConfig();

afterEach(() => {
  resetConfig();
});
