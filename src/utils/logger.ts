/**
 * stock-sentinel: Logging Utilities
 *
 * Structured logging using Pino with automatic redaction
 * of sensitive fields and consistent formatting.
 *
 * @module utils/logger
 */

import pino from 'pino';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogLevel } from '../types/index.js';

export type Logger = pino.Logger;

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

const baseOptions = (name: string, level: LogLevel): pino.LoggerOptions => ({
  name,
  level,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
});

export function createLogger(name: string, options?: { level?: LogLevel }): Logger {
  return pino(baseOptions(name, options?.level ?? 'info'));
}

const LOG_FILE_PATTERN = /^monitor-(\d{4})-(\d{2})-(\d{2})\.log$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function logFileName(date: Date): string {
  return `monitor-${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}.log`;
}

/**
 * Logger writing to stdout and to a dated file in `logsDir`.
 * The file is chosen once, at creation time.
 */
export function createFileLogger(
  name: string,
  logsDir: string,
  options?: { level?: LogLevel; now?: Date },
): Logger {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true, mode: 0o700 });
  }

  const logFile = path.join(logsDir, logFileName(options?.now ?? new Date()));
  const streams = pino.multistream([
    { level: 'trace', stream: process.stdout },
    { level: 'trace', stream: pino.destination({ dest: logFile, append: true, sync: false }) },
  ]);

  return pino(baseOptions(name, options?.level ?? 'info'), streams);
}

/**
 * Delete dated log files older than `daysToKeep`. Returns the removed file names.
 */
export function pruneLogFiles(logsDir: string, daysToKeep: number, now: Date = new Date()): string[] {
  if (!fs.existsSync(logsDir)) return [];

  const cutoff = new Date(now.getFullYear(), now.getMonth(), now.getDate() - daysToKeep);
  const removed: string[] = [];

  for (const file of fs.readdirSync(logsDir)) {
    const match = LOG_FILE_PATTERN.exec(file);
    if (!match) continue;

    const fileDate = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
    if (fileDate < cutoff) {
      fs.rmSync(path.join(logsDir, file), { force: true });
      removed.push(file);
    }
  }

  return removed;
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'key', 'auth', 'credential'];

export function redact<T extends Record<string, unknown>>(
  obj: T,
  additionalFields: string[] = [],
): T {
  const fieldsToRedact = [...SENSITIVE_FIELDS, ...additionalFields];
  const result = { ...obj };

  for (const key of Object.keys(result)) {
    const lowerKey = key.toLowerCase();
    if (fieldsToRedact.some((field) => lowerKey.includes(field))) {
      result[key as keyof T] = '[REDACTED]' as T[keyof T];
    } else if (typeof result[key] === 'object' && result[key] !== null && !Array.isArray(result[key])) {
      result[key as keyof T] = redact(
        result[key] as Record<string, unknown>,
        additionalFields,
      ) as T[keyof T];
    }
  }

  return result;
}
