/**
 * Generator Registry
 *
 * Keeps one generator per API name and serves random quotes across all of
 * them.
 *
 * Usage:
 *   const registry = GeneratorRegistry.getInstance();
 *   for (const generator of createDefaultGenerators()) registry.register(generator);
 *   const { apiName, quote } = await registry.getRandomQuote();
 */

import { mathRandom, type RandomNumberGenerator } from '../core/random.js';
import { invalidOperation, isNonBlank, notFound, nullOrEmpty } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { QuoteGenerator, QuoteInclude, SourcedQuote } from './types.js';

export class GeneratorRegistry {
  private static instance: GeneratorRegistry | null = null;

  private generators: Map<string, QuoteGenerator> = new Map();

  private constructor() {}

  /**
   * Get singleton instance
   */
  static getInstance(): GeneratorRegistry {
    if (!GeneratorRegistry.instance) {
      GeneratorRegistry.instance = new GeneratorRegistry();
    }
    return GeneratorRegistry.instance;
  }

  /**
   * Reset instance (for testing)
   */
  static resetInstance(): void {
    GeneratorRegistry.instance = null;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Add a generator, replacing any previous one with the same API name
   */
  register(generator: QuoteGenerator): void {
    this.generators.set(generator.apiName, generator);
    logger.debug({ apiName: generator.apiName }, 'Quote generator registered');
  }

  unregister(apiName: string): boolean {
    return this.generators.delete(apiName);
  }

  has(apiName: string): boolean {
    return this.generators.has(apiName);
  }

  get(apiName: string): QuoteGenerator {
    if (!isNonBlank(apiName)) {
      throw nullOrEmpty('apiName');
    }

    const generator = this.generators.get(apiName);
    if (!generator) {
      throw notFound(`No generator registered for ${apiName}`, { apiName, registered: this.names() });
    }
    return generator;
  }

  names(): string[] {
    return Array.from(this.generators.keys());
  }

  get size(): number {
    return this.generators.size;
  }

  // ==========================================================================
  // Quotes
  // ==========================================================================

  /**
   * Random quote from a randomly chosen API
   */
  async getRandomQuote(which: QuoteInclude = 'all', random: RandomNumberGenerator = mathRandom): Promise<SourcedQuote> {
    const generators = Array.from(this.generators.values());
    const generator = generators.length > 0 ? generators[random.nextInt(0, generators.length)] : undefined;
    if (!generator) {
      throw invalidOperation('No quote generators registered', 'Register a generator first, e.g. createDefaultGenerators()');
    }

    const quote = await generator.getRandomQuote(which);
    return { apiName: generator.apiName, quote };
  }
}

export const getGeneratorRegistry = (): GeneratorRegistry => GeneratorRegistry.getInstance();
