import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

/** Which trigger-event records are processed: every record, or only the first one. */
export const eventModes = z.enum(['all', 'first']);
/** How the corpus-wide quality score is obtained. */
export const scoreModes = z.enum(['incremental', 'rescan']);
/** How classifier response lines are matched to feedback rows. */
export const correlationModes = z.enum(['tagged', 'positional']);
/** What happens when a run is triggered while another run of the same job is still RUNNING. */
export const duplicateRunPolicies = z.enum(['allow', 'skip-if-running']);

const prefix = z
  .string()
  .min(1)
  .transform((p) => (p.endsWith('/') ? p : `${p}/`));

const positiveInt = z.coerce.number().int().positive();

export const pipelineConfigSchema = z.object({
  jobName: z.string().min(1).default('Customer-360'),
  rawPrefix: prefix.default('raw/'),
  acceptedPrefix: prefix.default('validated/'),
  rejectedPrefix: prefix.default('error/'),
  trackingTable: z.string().min(1).default('customer360_etl_tracking'),
  profileTable: z.string().min(1).default('customer360_golden'),
  databaseUrl: z.string().default(''),
  eventMode: eventModes.default('all'),
  scoreMode: scoreModes.default('incremental'),
  correlation: correlationModes.default('tagged'),
  partitionSize: positiveInt.default(25),
  maxConcurrentPartitions: positiveInt.default(1),
  duplicateRunPolicy: duplicateRunPolicies.default('allow'),
  runLeaseMs: positiveInt.default(900_000),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type EventMode = z.infer<typeof eventModes>;
export type ScoreMode = z.infer<typeof scoreModes>;
export type CorrelationMode = z.infer<typeof correlationModes>;
export type DuplicateRunPolicy = z.infer<typeof duplicateRunPolicies>;

const ENV_KEYS: Record<keyof PipelineConfig, string> = {
  jobName: 'C360_JOB_NAME',
  rawPrefix: 'C360_RAW_PREFIX',
  acceptedPrefix: 'C360_ACCEPTED_PREFIX',
  rejectedPrefix: 'C360_REJECTED_PREFIX',
  trackingTable: 'C360_TRACKING_TABLE',
  profileTable: 'C360_PROFILE_TABLE',
  databaseUrl: 'C360_DATABASE_URL',
  eventMode: 'C360_EVENT_MODE',
  scoreMode: 'C360_SCORE_MODE',
  correlation: 'C360_CORRELATION',
  partitionSize: 'C360_PARTITION_SIZE',
  maxConcurrentPartitions: 'C360_MAX_CONCURRENT_PARTITIONS',
  duplicateRunPolicy: 'C360_DUPLICATE_RUN_POLICY',
  runLeaseMs: 'C360_RUN_LEASE_MS',
};

function isConfigKey(field: unknown): field is keyof PipelineConfig {
  return typeof field === 'string' && Object.prototype.hasOwnProperty.call(ENV_KEYS, field);
}

/**
 * Build the pipeline configuration from environment variables (`C360_*`).
 * Unset or empty variables fall back to their defaults.
 *
 * @throws ConfigurationError listing every invalid variable.
 */
export function loadPipelineConfig(env: Readonly<Record<string, string | undefined>> = process.env): PipelineConfig {
  const input: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') input[field] = value.trim();
  }

  const result = pipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path[0];
      const envKey = isConfigKey(field) ? ENV_KEYS[field] : String(field);
      return `${envKey}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

/** Defaults with optional overrides, for wiring components in code and tests. */
export function defaultPipelineConfig(overrides: Partial<z.input<typeof pipelineConfigSchema>> = {}): PipelineConfig {
  return pipelineConfigSchema.parse(overrides);
}
