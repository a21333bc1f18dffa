import { availableParallelism } from 'node:os';
import type { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { DEFAULT_VEHICLE_ID_PATTERN } from '../common/vehicle-id';
import type { RetryPolicyOptions } from '../pipeline/retry-policy';

export const PIPELINE_SETTINGS = Symbol('PIPELINE_SETTINGS');

const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

/**
 * Environment schema. Every value has a default so a bare `run` works
 * against a local directory without any environment at all.
 */
export const envSchema = z.object({
  AWS_REGION: z.string().min(1).optional(),
  PIPELINE_WORKERS: z.coerce.number().int().min(1).optional(),
  PIPELINE_QUEUE_CAPACITY: z.coerce.number().int().min(1).optional(),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  FETCH_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(8_000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(30_000),
  VEHICLE_ID_PATTERN: z
    .string()
    .min(1)
    .default(DEFAULT_VEHICLE_ID_PATTERN)
    .refine(isValidPattern, { message: 'not a valid regular expression' }),
  DEAD_VEHICLES_CSV: z.string().min(1).default('config/isDead.csv'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
});

export type PipelineEnv = z.infer<typeof envSchema>;

export interface PipelineSettings {
  region?: string;
  /** Worker count when the CLI does not override it */
  workers: number;
  /** Pending-queue capacity; defaults to twice the worker count */
  queueCapacity?: number;
  fetchTimeoutMs: number;
  retry: RetryPolicyOptions;
  shutdownGraceMs: number;
  vehicleIdPattern: string;
  deadVehiclesCsv: string;
}

/**
 * `validate` hook for ConfigModule.forRoot.
 */
export function validateEnv(config: Record<string, unknown>): PipelineEnv {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return result.data;
}

export function toPipelineSettings(env: PipelineEnv): PipelineSettings {
  return {
    region: env.AWS_REGION,
    workers: env.PIPELINE_WORKERS ?? Math.max(1, availableParallelism()),
    queueCapacity: env.PIPELINE_QUEUE_CAPACITY,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    retry: {
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      baseDelayMs: env.FETCH_BACKOFF_BASE_MS,
      maxDelayMs: Math.max(env.FETCH_BACKOFF_BASE_MS, env.FETCH_BACKOFF_MAX_MS),
      factor: 2,
    },
    shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
    vehicleIdPattern: env.VEHICLE_ID_PATTERN,
    deadVehiclesCsv: env.DEAD_VEHICLES_CSV,
  };
}

export function settingsFromConfig(
  config: ConfigService<PipelineEnv, true>,
): PipelineSettings {
  return toPipelineSettings({
    AWS_REGION: config.get('AWS_REGION', { infer: true }),
    PIPELINE_WORKERS: config.get('PIPELINE_WORKERS', { infer: true }),
    PIPELINE_QUEUE_CAPACITY: config.get('PIPELINE_QUEUE_CAPACITY', {
      infer: true,
    }),
    FETCH_TIMEOUT_MS: config.get('FETCH_TIMEOUT_MS', { infer: true }),
    FETCH_MAX_ATTEMPTS: config.get('FETCH_MAX_ATTEMPTS', { infer: true }),
    FETCH_BACKOFF_BASE_MS: config.get('FETCH_BACKOFF_BASE_MS', { infer: true }),
    FETCH_BACKOFF_MAX_MS: config.get('FETCH_BACKOFF_MAX_MS', { infer: true }),
    SHUTDOWN_GRACE_MS: config.get('SHUTDOWN_GRACE_MS', { infer: true }),
    VEHICLE_ID_PATTERN: config.get('VEHICLE_ID_PATTERN', { infer: true }),
    DEAD_VEHICLES_CSV: config.get('DEAD_VEHICLES_CSV', { infer: true }),
    LOG_LEVEL: config.get('LOG_LEVEL', { infer: true }),
  });
}

/**
 * Nest logger levels enabled at and above the configured threshold.
 */
export function enabledLogLevels(level: PipelineEnv['LOG_LEVEL']): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}
