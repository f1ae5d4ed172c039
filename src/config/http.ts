/**
 * HTTP Configuration
 *
 * Read once from the environment. Every resolver receives the resulting
 * immutable object; nothing reads process.env after startup.
 *
 * Environment:
 *   QUOTES_HTTP_TIMEOUT_MS   - per-request timeout (default 10000)
 *   QUOTES_HTTP_CONCURRENCY  - parallel page downloads, 1-16 (default 4)
 *   QUOTES_USER_AGENT        - User-Agent header (default quote-harbor/1.0.0)
 */

import { z } from 'zod';
import { QuoteError, QuoteErrorCode } from '../errors.js';

export interface HttpConfig {
  readonly timeoutMs: number;
  readonly concurrency: number;
  readonly userAgent: string;
}

const HttpEnvSchema = z.object({
  QUOTES_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  QUOTES_HTTP_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  QUOTES_USER_AGENT: z.string().trim().min(1).default('quote-harbor/1.0.0'),
});

export const DEFAULT_HTTP_CONFIG: HttpConfig = Object.freeze({
  timeoutMs: 10_000,
  concurrency: 4,
  userAgent: 'quote-harbor/1.0.0',
});

/**
 * Parse HTTP settings from an environment map
 */
export function loadHttpConfig(env: NodeJS.ProcessEnv = process.env): HttpConfig {
  const parsed = HttpEnvSchema.safeParse({
    QUOTES_HTTP_TIMEOUT_MS: env.QUOTES_HTTP_TIMEOUT_MS || undefined,
    QUOTES_HTTP_CONCURRENCY: env.QUOTES_HTTP_CONCURRENCY || undefined,
    QUOTES_USER_AGENT: env.QUOTES_USER_AGENT || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new QuoteError(
      QuoteErrorCode.INVALID_ARGUMENT,
      `Invalid HTTP configuration: ${issue.path.join('.')} ${issue.message}`,
      'Check the QUOTES_HTTP_* environment variables',
    );
  }

  return Object.freeze({
    timeoutMs: parsed.data.QUOTES_HTTP_TIMEOUT_MS,
    concurrency: parsed.data.QUOTES_HTTP_CONCURRENCY,
    userAgent: parsed.data.QUOTES_USER_AGENT,
  });
}
