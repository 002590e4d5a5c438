/**
 * stock-sentinel: Core Type Definitions
 *
 * Configuration schemas and the functional Result type.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const CacheNameSchema = z.enum(['stock', 'expiration', 'phones']);
export type CacheName = z.infer<typeof CacheNameSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
// Abort timeouts ride on a single timer, which tops out near 24.8 days
const timeoutSeconds = (fallback: number) => z.coerce.number().int().positive().max(2_147_483).default(fallback);

export const ConfigSchema = z.object({
  telegram: z.object({
    bot_token: z.string().min(1, 'BOT_TOKEN is required'),
    chat_id: z.string().min(1, 'CHAT_ID is required'),
    message_limit: positiveInt(4096),
    chunk_delay_ms: nonNegativeInt(1000),
    allowed_user_ids: z.array(z.coerce.number().int()).default([]),
  }),
  moysklad: z.object({
    token: z.string().min(1, 'MS_TOKEN is required'),
    page_size: z.coerce.number().int().positive().max(1000).default(500),
    request_timeout_seconds: timeoutSeconds(30),
    expiration_attribute: z.string().min(1).default('Expiration date'),
    counterparty_tags: z.array(z.string().min(1)).default([]),
  }),
  monitor: z.object({
    check_interval_minutes: positiveInt(720),
    alert_days: nonNegativeInt(7),
    alert_suppression_hours: positiveInt(24),
    fetch_timeout_seconds: timeoutSeconds(300),
  }),
  cache: z.object({
    reset_days: positiveInt(30),
    purge_every_cycles: positiveInt(12),
  }),
  lookup: z.object({
    max_attempts: positiveInt(5),
    retry_delay_seconds: nonNegativeInt(60),
  }),
  paths: z.object({
    data_dir: z.string().min(1).default('data'),
  }),
  logging: z.object({
    level: LogLevelSchema.default('info'),
    days_to_keep: positiveInt(30),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
