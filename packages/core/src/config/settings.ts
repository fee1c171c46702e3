/**
 * Core Settings
 *
 * Tunables of the fetch-and-delivery layer. The defaults mirror what has
 * worked against one provider's throttling; none of them are hard limits.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const ms = z.number().int().min(0);

const rangeSchema = z
  .object({ min: ms, max: ms })
  .refine(r => r.max >= r.min, { message: 'max must be >= min' });

export const settingsSchema = z.object({
  rateLimit: z.object({
    maxRequests: z.number().int().min(1).default(75),
    windowMs: ms.default(660_000),
    jitterMs: rangeSchema.default({ min: 500, max: 5_000 }),
  }).default({}),

  proxy: z.object({
    rotateEvery: z.number().int().min(1).default(20),
    shuffle: z.boolean().default(true),
  }).default({}),

  retry: z.object({
    maxAttempts: z.number().int().min(1).default(3),
    baseDelayMs: ms.default(1_000),
    maxBackoffMs: ms.default(60_000),
    defaultRetryAfterMs: ms.default(300_000),
  }).default({}),

  transfer: z.object({
    batchSize: z.number().int().min(1).default(50),
    concurrency: z.number().int().min(1).max(64).default(16),
    directAttempts: z.number().int().min(1).default(3),
    timeoutMs: ms.default(60_000),
  }).default({}),

  pacing: z.object({
    pageDelayMs: rangeSchema.default({ min: 1_000, max: 3_000 }),
    breakEveryItems: rangeSchema.default({ min: 50, max: 80 }),
    breakDurationMs: rangeSchema.default({ min: 10_000, max: 30_000 }),
  }).default({}),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

/**
 * Validate partial settings and fill in defaults
 */
export function resolveSettings(input: SettingsInput = {}): Settings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'settings';
    throw new ValidationError(field, issue?.message ?? 'invalid settings');
  }
  return result.data;
}

export const defaultSettings: Settings = resolveSettings();
