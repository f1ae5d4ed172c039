/**
 * Provider System Entry Point
 *
 * Builds the generators of every built-in quote API and registers them.
 *
 * Usage:
 *   import { registerDefaultGenerators } from './providers/index.js';
 *
 *   registerDefaultGenerators();
 *   const { apiName, quote } = await getGeneratorRegistry().getRandomQuote();
 */

import { loadHttpConfig } from '../config/http.js';
import { getGeneratorRegistry, type GeneratorRegistry } from '../generators/registry.js';
import type { QuoteGenerator } from '../generators/types.js';
import { logger } from '../utils/logger.js';
import { createKanyeRestGenerator } from './kanye-rest/generator.js';
import { createQuotableGenerator } from './quotable/generator.js';
import { createTronaldDumpGenerator } from './tronald-dump/generator.js';
import type { ProviderOptions } from './types.js';

export * from './types.js';
export { resolverFor, isStreamResolver } from './resolver.js';

/**
 * Shared by every built-in provider; each one gets its own resolver
 */
export type DefaultGeneratorOptions = Omit<ProviderOptions, 'resolver'>;

export function createDefaultGenerators(options: DefaultGeneratorOptions = {}): QuoteGenerator[] {
  const shared: DefaultGeneratorOptions = { ...options, config: options.config ?? loadHttpConfig() };

  return [createKanyeRestGenerator(shared), createQuotableGenerator(shared), createTronaldDumpGenerator(shared)];
}

/**
 * Register the built-in generators, replacing any with the same API name
 * @returns the registered API names
 */
export function registerDefaultGenerators(
  registry: GeneratorRegistry = getGeneratorRegistry(),
  options: DefaultGeneratorOptions = {},
): string[] {
  const generators = createDefaultGenerators(options);
  for (const generator of generators) {
    registry.register(generator);
  }

  const names = generators.map((generator) => generator.apiName);
  logger.info({ generators: names }, 'Built-in quote generators registered');
  return names;
}
