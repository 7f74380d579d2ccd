/**
 * dns-reconciler - Library entry point
 *
 * Computes and applies the changes that bring a DNS zone to a desired record set
 */
export * from './core/index.js';
export * from './types/index.js';
export * from './providers/index.js';
export { ConfigManager, getConfig, resetConfig, type ProviderEnvironment } from './config/ConfigManager.js';
export {
  identityKey,
  sameContent,
  normalizeRecord,
  normalizeHost,
  toFqdn,
  validateRecord,
  describeRecord,
  matchesSelector,
} from './records/RecordModel.js';
export {
  loadDesiredState,
  parseDesiredState,
  serializeDesiredState,
  DEFAULT_IGNORE,
  type DesiredStateFormat,
} from './records/DesiredStateLoader.js';
export { computeDiff, compareOperations } from './services/DiffEngine.js';
export {
  Reconciler,
  describeOperation,
  type ReconcileOptions,
  type ReconcilePlan,
  type ReconcileResult,
  type ReconcileFailure,
} from './services/Reconciler.js';
export { formatResult, formatOperation, resultToJson } from './services/PlanFormatter.js';
export { createCLI } from './cli/index.js';
