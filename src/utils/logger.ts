/**
 * Structured Logging & Observability
 *
 * Provides:
 * - Fast JSON logging via pino
 * - Timing utilities for upstream HTTP calls
 * - In-memory error ring buffer
 * - Metrics aggregation (counts, durations)
 *
 * Usage:
 *   import { logger, withTiming, getStats } from './utils/logger.js';
 *
 *   logger.info({ provider: 'quotable', path: 'random' }, 'Downloading quote');
 *
 *   const { result } = await withTiming('quotable.random', { path }, async () => {
 *     return await resolver.resolve('random', QuoteModelSchema);
 *   });
 */

import pino from 'pino';

// ============================================================================
// Logger Configuration
// ============================================================================

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = process.env.NODE_ENV !== 'production';

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isDev ? 'debug' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  transport:
    isDev && !isTest
      ? {
          target: 'pino/file',
          options: { destination: 2 }, // stderr, stdout belongs to the host application
        }
      : undefined,
  base: {
    service: 'quote-harbor',
    version: '1.0.0',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// ============================================================================
// Timing Utilities
// ============================================================================

export interface TimingContext {
  [key: string]: string | number | boolean | undefined;
}

export interface TimingResult<T> {
  result: T;
  durationMs: number;
}

/**
 * Execute an async function with timing measurement and logging
 */
export async function withTiming<T>(
  operation: string,
  context: TimingContext,
  fn: () => Promise<T>
): Promise<TimingResult<T>> {
  const startTime = performance.now();

  try {
    const result = await fn();
    const durationMs = Math.round(performance.now() - startTime);

    logger.debug({ operation, ...context, durationMs, success: true }, `${operation} completed`);
    recordMetric(operation, durationMs, true);

    return { result, durationMs };
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);

    logger.error(
      {
        operation,
        ...context,
        durationMs,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      },
      `${operation} failed`
    );

    recordMetric(operation, durationMs, false);
    recordError(operation, error);

    throw error;
  }
}

/**
 * Create a child logger with bound context
 */
export function createChildLogger(context: TimingContext): pino.Logger {
  return logger.child(context);
}

// ============================================================================
// Metrics Aggregation
// ============================================================================

interface OperationMetrics {
  count: number;
  successCount: number;
  errorCount: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  lastDurationMs: number;
  lastUpdated: number;
}

const metrics = new Map<string, OperationMetrics>();

function recordMetric(operation: string, durationMs: number, success: boolean): void {
  const existing = metrics.get(operation);

  if (existing) {
    existing.count++;
    if (success) existing.successCount++;
    else existing.errorCount++;
    existing.totalDurationMs += durationMs;
    existing.minDurationMs = Math.min(existing.minDurationMs, durationMs);
    existing.maxDurationMs = Math.max(existing.maxDurationMs, durationMs);
    existing.lastDurationMs = durationMs;
    existing.lastUpdated = Date.now();
  } else {
    metrics.set(operation, {
      count: 1,
      successCount: success ? 1 : 0,
      errorCount: success ? 0 : 1,
      totalDurationMs: durationMs,
      minDurationMs: durationMs,
      maxDurationMs: durationMs,
      lastDurationMs: durationMs,
      lastUpdated: Date.now(),
    });
  }
}

// ============================================================================
// Error Ring Buffer
// ============================================================================

interface ErrorEntry {
  operation: string;
  message: string;
  count: number;
  firstSeen: number;
  lastSeen: number;
}

const MAX_ERROR_ENTRIES = 100;
const errorBuffer: ErrorEntry[] = [];
const errorCounts = new Map<string, ErrorEntry>();

function errorKey(operation: string, message: string): string {
  return `${operation}:${message.slice(0, 100)}`;
}

function recordError(operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const key = errorKey(operation, message);
  const now = Date.now();

  const existing = errorCounts.get(key);

  if (existing) {
    existing.count++;
    existing.lastSeen = now;
    return;
  }

  const entry: ErrorEntry = {
    operation,
    message: message.slice(0, 500),
    count: 1,
    firstSeen: now,
    lastSeen: now,
  };

  errorCounts.set(key, entry);
  errorBuffer.push(entry);

  if (errorBuffer.length > MAX_ERROR_ENTRIES) {
    const removed = errorBuffer.shift();
    if (removed) {
      errorCounts.delete(errorKey(removed.operation, removed.message));
    }
  }
}

// ============================================================================
// Stats & Observability
// ============================================================================

export interface Stats {
  uptime: number;
  metrics: Record<
    string,
    {
      count: number;
      successRate: number;
      avgDurationMs: number;
      minDurationMs: number;
      maxDurationMs: number;
      lastDurationMs: number;
    }
  >;
  recentErrors: Array<{
    operation: string;
    message: string;
    count: number;
    lastSeen: string;
  }>;
}

const startTime = Date.now();

/**
 * Get current stats for observability
 */
export function getStats(): Stats {
  const metricsOutput: Stats['metrics'] = {};

  for (const [operation, m] of metrics) {
    metricsOutput[operation] = {
      count: m.count,
      successRate: m.count > 0 ? Math.round((m.successCount / m.count) * 100) : 0,
      avgDurationMs: m.count > 0 ? Math.round(m.totalDurationMs / m.count) : 0,
      minDurationMs: m.minDurationMs,
      maxDurationMs: m.maxDurationMs,
      lastDurationMs: m.lastDurationMs,
    };
  }

  // Last 10, newest first
  const recentErrors = errorBuffer
    .slice(-10)
    .reverse()
    .map((e) => ({
      operation: e.operation,
      message: e.message,
      count: e.count,
      lastSeen: new Date(e.lastSeen).toISOString(),
    }));

  return {
    uptime: Math.round((Date.now() - startTime) / 1000),
    metrics: metricsOutput,
    recentErrors,
  };
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetStats(): void {
  metrics.clear();
  errorBuffer.length = 0;
  errorCounts.clear();
}
