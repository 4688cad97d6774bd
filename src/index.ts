export * from './execution';
export { createEngine, type CreateEngineOptions, type CreatedEngine } from './engine';
export {
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  mergeEngineConfig,
  validateEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './config/engine.config';
export { getEnvironmentConfig, EnvironmentError, type EnvironmentConfig } from './config/env';
