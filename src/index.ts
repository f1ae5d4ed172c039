/**
 * quote-harbor
 *
 * Random and enumerable quotes from several public quote APIs behind one
 * cache-backed generator interface.
 *
 * Usage:
 *   import { getGeneratorRegistry, registerDefaultGenerators } from 'quote-harbor';
 *
 *   registerDefaultGenerators();
 *   const { apiName, quote } = await getGeneratorRegistry().getRandomQuote();
 *   console.log(`${quote} (${apiName})`);
 */

export * from './errors.js';
export { Id, type IdLike } from './core/id.js';
export * from './core/quote.js';
export * from './core/random.js';
export * from './cache/index.js';
export * from './resolvers/index.js';
export * from './generators/index.js';
export * from './providers/index.js';
export { KANYE_REST, QUOTABLE, TRONALD_DUMP, BUILT_IN_APIS, type BuiltInApi } from './config/apis.js';
export { loadHttpConfig, DEFAULT_HTTP_CONFIG, type HttpConfig } from './config/http.js';
export { logger, createChildLogger, withTiming, getStats, resetStats } from './utils/logger.js';

export * as kanyeRest from './providers/kanye-rest/index.js';
export * as quotable from './providers/quotable/index.js';
export * as tronaldDump from './providers/tronald-dump/index.js';
