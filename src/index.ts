export * from './types.js';
export { AlgorithmCatalog, UNKNOWN_COMPLEXITY, DEFAULT_CATALOG_PATH, loadDefaultCatalog, parseCatalogTable } from './catalog.js';
export { QPolicy, DEFAULT_POLICY_OPTIONS } from './policy.js';
export { GeneticOptimizer, DEFAULT_GENETIC_OPTIONS } from './genetic.js';
export { DiscoveryCoordinator, stateKey, sizeBucket, type CoordinatorOptions, type DiscoverOptions, type ProblemRef } from './discovery.js';
export { ParameterOptimizer, type ParameterOptimizerOptions } from './optimizer.js';
export { RunStore } from './persist.js';
export { loadConfig, resolveConfig, configFromEnv, DEFAULT_CONFIG, type AgentConfig } from './config.js';
export { Random } from './random.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js';
export {
  AgentError, ErrorCodes, NoLegalActionsError, NoTemplatesError, FitnessEvaluationError, InvalidConfigError, StoreError,
  type ErrorCode
} from './errors.js';
