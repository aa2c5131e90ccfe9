export { ConcurrentPool, type PoolProgress } from './utils/concurrent-pool';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  LLMCallError,
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallResult,
  type LLMVisionCallConfig,
} from './utils/llm-caller';
export { MODEL_PRICING, calculateCost } from './utils/model-pricing';
export {
  detectProvider,
  getModelName,
  type ProviderType,
} from './utils/provider-detector';
