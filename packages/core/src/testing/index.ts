export {
  InMemoryAssetPort,
  StaticPriceOracle,
  FixedRateSwapRouter,
  fixedClock,
} from './in-memory-ports.js';
export type { ManualClock } from './in-memory-ports.js';
export { createTestEngine, TEST_CONFIG, TEST_START_TIME } from './test-engine.js';
export type { TestEngine } from './test-engine.js';
