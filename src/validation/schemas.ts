/**
 * Validation Schemas
 *
 * Zod schemas for constructor options. Omitted values fall back to the
 * environment configuration, so every field is optional here.
 */

import { z, type ZodError } from 'zod';
import { ConfigValidationError } from '../core/errors.js';

// ============================================================================
// Primitives
// ============================================================================

const NameSchema = z.string().trim().min(1, 'name cannot be empty');

const DurationMsSchema = z
  .number({ invalid_type_error: 'duration must be a number' })
  .int('duration must be an integer')
  .min(0, 'duration must be non-negative')
  .max(300000, 'duration cannot exceed 5 minutes (300000ms)');

// ============================================================================
// Option Schemas
// ============================================================================

export const WorkerChannelOptionsSchema = z.object({
  name: NameSchema.optional(),
  pollIntervalMs: DurationMsSchema.refine((val) => val >= 1, {
    message: 'pollIntervalMs must be at least 1',
  }).optional(),
  shutdownTimeoutMs: DurationMsSchema.optional(),
  statsHistory: z.number().int().min(1, 'statsHistory must be at least 1').optional(),
});

export type WorkerChannelSettings = z.infer<typeof WorkerChannelOptionsSchema>;

export const VirtualCacheOptionsSchema = z.object({
  name: NameSchema.optional(),
  category: NameSchema.optional(),
  mergeLimit: z.number().int().min(0, 'mergeLimit must be non-negative').optional(),
  batchSize: z.number().int().min(1, 'batchSize must be at least 1').optional(),
  prefetchBatches: z.number().int().min(0, 'prefetchBatches must be non-negative').optional(),
  dispatchDelayMs: DurationMsSchema.optional(),
  errorRetryCooldownMs: DurationMsSchema.optional(),
  autoCount: z.boolean().optional(),
});

export type VirtualCacheSettings = z.infer<typeof VirtualCacheOptionsSchema>;

// ============================================================================
// Parsing
// ============================================================================

function toConfigValidationError(zodError: ZodError, target: string): ConfigValidationError {
  const validationErrors = zodError.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? path + ': ' : ''}${issue.message}`;
  });
  return new ConfigValidationError(`Invalid ${target} options`, validationErrors, {
    zodIssues: zodError.issues,
  });
}

/**
 * @throws {ConfigValidationError} When any option is out of range
 */
export function parseWorkerChannelOptions(input: unknown): WorkerChannelSettings {
  const parsed = WorkerChannelOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw toConfigValidationError(parsed.error, 'worker channel');
  }
  return parsed.data;
}

/**
 * @throws {ConfigValidationError} When any option is out of range
 */
export function parseVirtualCacheOptions(input: unknown): VirtualCacheSettings {
  const parsed = VirtualCacheOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw toConfigValidationError(parsed.error, 'virtual cache');
  }
  return parsed.data;
}
