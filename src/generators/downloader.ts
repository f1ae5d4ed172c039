/**
 * Helpers shared by the provider download strategies
 */

import type { TagFilter } from '../cache/types.js';
import type { IQuote } from '../core/quote.js';
import type { RandomNumberGenerator } from '../core/random.js';
import { invalidOperation, isNonBlank } from '../errors.js';

export function nonBlankTags(tags: TagFilter): string[] {
  return (tags ?? []).filter(isNonBlank);
}

/**
 * One of the given tags chosen uniformly, or null when none is usable
 */
export function pickTag(tags: TagFilter, random: RandomNumberGenerator): string | null {
  const usable = nonBlankTags(tags);
  if (usable.length === 0) return null;
  return usable[random.nextInt(0, usable.length)] ?? null;
}

/**
 * First occurrence of every id, in order
 */
export function uniqueById<T extends IQuote>(quotes: Iterable<T>): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const quote of quotes) {
    if (seen.has(quote.id.value)) continue;
    seen.add(quote.id.value);
    unique.push(quote);
  }
  return unique;
}

export function unsupportedOperation(apiName: string, operation: string): never {
  throw invalidOperation(`${apiName} does not support ${operation}`);
}
