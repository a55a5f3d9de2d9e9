import { FolioError } from '@folio/core';
import { z } from 'zod';
import type { LoggerSetting } from './logger.js';

/** Delays, in seconds, handed to version listings for individually delayed objects */
export const DEFAULT_SYNC_DELAY_INTERVALS = [0, 60, 300, 900, 3600];

/** Delays, in seconds, before a scheduled retry, by attempt */
export const DEFAULT_RETRY_DELAYS = [2, 10, 30, 60];

export const DEFAULT_MAX_RETRY_COUNT = 3;

const loggerSettingSchema = z.custom<LoggerSetting>(
  (value) => value === false || (typeof value === 'object' && value !== null),
  { message: 'Expected logger options, a logger or false' }
);

const secondsSchema = z.array(z.number().nonnegative());

/**
 * Configuration of a {@link SyncController}
 */
export const syncControllerConfigSchema = z.object({
  /** Id of the signed in user, used for the personal library path */
  userId: z.number().int().positive(),
  /** Times a failed sync is retried */
  maxRetryCount: z.number().int().nonnegative().default(DEFAULT_MAX_RETRY_COUNT),
  syncDelayIntervals: secondsSchema.default(() => [...DEFAULT_SYNC_DELAY_INTERVALS]),
  logger: loggerSettingSchema.optional(),
});

/**
 * Configuration of a {@link SyncScheduler}
 */
export const syncSchedulerConfigSchema = z.object({
  retryDelays: secondsSchema.min(1).default(() => [...DEFAULT_RETRY_DELAYS]),
  logger: loggerSettingSchema.optional(),
});

export type SyncControllerConfigInput = z.input<typeof syncControllerConfigSchema>;
export type SyncControllerConfig = z.output<typeof syncControllerConfigSchema>;
export type SyncSchedulerConfigInput = z.input<typeof syncSchedulerConfigSchema>;
export type SyncSchedulerConfig = z.output<typeof syncSchedulerConfigSchema>;

function parseConfig<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  input: unknown,
  name: string
): Output {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  throw new FolioError({
    code: 'FOLIO_V100',
    message: `Invalid ${name} configuration`,
    context: {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    },
    cause: result.error,
  });
}

export function parseSyncControllerConfig(input: SyncControllerConfigInput): SyncControllerConfig {
  return parseConfig(syncControllerConfigSchema, input, 'sync controller');
}

export function parseSyncSchedulerConfig(input: SyncSchedulerConfigInput = {}): SyncSchedulerConfig {
  return parseConfig(syncSchedulerConfigSchema, input, 'sync scheduler');
}
