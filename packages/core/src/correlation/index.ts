/**
 * Correlation Layer
 * Local, remote and privacy-preserving correlation behind one router
 */

export * from './types.js';
export { CorrelationEngine, type CorrelationEngineOptions } from './correlation-engine.js';
export { ModeRouter, isSameSource, hostKey, type RouterCapabilities } from './mode-router.js';
export { LocalStrategy, LOCAL_OPERATIONS, type LocalStrategyConfig } from './strategies/local-strategy.js';
export {
  RemoteStrategy,
  InProcessComputeNode,
  type ComputeNode,
  type ComputeTask,
} from './strategies/remote-strategy.js';
export {
  PrivacyStrategy,
  PRIVACY_OPERATIONS,
  DataOwner,
  ShareHolder,
  type CoordinatorMessage,
  type CoordinatorObserver,
  type PrivacyStrategyOptions,
} from './strategies/privacy-strategy.js';
export * from './secret-sharing.js';
export * from './kernels.js';
export * from './fft.js';
export * from './signal-math.js';
