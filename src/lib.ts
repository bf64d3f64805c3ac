/**
 * Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Orchestrator (main entry point)
export * from './orchestrator/index.js';

// Artifacts
export * as artifacts from './artifacts/index.js';

// Progress
export { ProgressReporter } from './observability/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type PipelineConfig, type RetryConfig } from './config/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger, sleep } from './utils/index.js';
