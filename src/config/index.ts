/**
 * Pipeline Configuration Module
 *
 * Centralizes configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Retry configuration schema for the research phase
 */
const retryConfigSchema = z.object({
  /** Total research attempts (1-10) */
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  /** Initial backoff in milliseconds */
  backoffMs: z.coerce.number().int().min(0).max(60000).default(1000),
  /** Backoff cap in milliseconds */
  maxBackoffMs: z.coerce.number().int().min(0).max(300000).default(30000),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Where committed article directories, snapshots and staging areas live
  outputDir: z.string().min(1).default('./drafts'),

  retry: retryConfigSchema,

  // Age after which leftover snapshots and staging directories are swept
  orphanMaxAgeHours: z.coerce.number().min(0).max(24 * 365).default(24),

  // Keep FAILED snapshots on disk for postmortem/resume instead of rolling back
  retainFailedSnapshots: booleanFromEnv.default('false'),
});

export type PipelineConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const raw = {
    outputDir: env['SEO_PIPELINE_OUTPUT_DIR'],
    retry: {
      maxAttempts: env['SEO_PIPELINE_MAX_RETRIES'],
      backoffMs: env['SEO_PIPELINE_RETRY_BACKOFF_MS'],
      maxBackoffMs: env['SEO_PIPELINE_RETRY_MAX_BACKOFF_MS'],
    },
    orphanMaxAgeHours: env['SEO_PIPELINE_ORPHAN_MAX_AGE_HOURS'],
    retainFailedSnapshots: env['SEO_PIPELINE_RETAIN_FAILED'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      outputDir: result.data.outputDir,
      maxAttempts: result.data.retry.maxAttempts,
      retainFailedSnapshots: result.data.retainFailedSnapshots,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: PipelineConfig | null = null;

export function getConfig(): PipelineConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
