// Core package public API

export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './config.js';
export * from './criteria/criteria.js';
export * from './rules/targets.js';
export * from './rules/condition.js';
export * from './rules/schema.js';
export * from './rules/rule-set.js';
export * from './rules/rule-set-loader.js';
export * from './rules/analysis.js';
export * from './engine/rationale.js';
export * from './engine/rule-set-handle.js';
export * from './engine/decision-engine.js';
export * from './extractor/types.js';
export * from './extractor/keyword-extractor.js';
export * from './extractor/provider.js';
export * from './extractor/llm-extractor.js';
export * from './extractor/factory.js';
export * from './harness/types.js';
export * from './harness/corpus.js';
export * from './harness/worker-pool.js';
export * from './harness/metrics.js';
export * from './harness/harness.js';
export * from './harness/report.js';
export * from './storage/repositories/interfaces.js';
export { SqliteValidationRunRepository } from './storage/repositories/sqlite/validation-run.repository.js';
export * from './storage/sqlite/client.js';
export * from './storage/sqlite/migrations.js';
export * from './di/container.js';
export * from './utils/logger.js';
export * from './utils/ui.js';
