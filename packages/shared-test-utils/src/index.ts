/**
 * @jetshards/test-utils
 *
 * Shared test utilities for the jetshards workspace
 */

// Matchers
export { setupArrayMatchers, arrayMatchers } from './matchers/array-matchers.js';

// Mocks
export { createMockFetch, type MockRoute } from './mocks/index.js';

// Fixtures
export {
  createShardArrays,
  writeShard,
  constituentValue,
  labelValue,
  type ShardDims,
} from './fixtures/index.js';

// Helpers
export { TempDirs } from './helpers/index.js';
