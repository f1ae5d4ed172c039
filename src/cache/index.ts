/**
 * Cache Module
 *
 * Tagged in-memory quote storage.
 */

export { TagIndex } from './tag-index.js';
export { QuoteCache } from './quote-cache.js';
export { BlockableQuoteCache } from './blockable-cache.js';
export type { IQuoteCache, QuoteCacheOptions, BlockableCacheOptions, TagFilter } from './types.js';
