export * from './types.js';
export { CachedQuoteGenerator, type CachedQuoteGeneratorOptions } from './cached-generator.js';
export { GeneratorRegistry, getGeneratorRegistry } from './registry.js';
export { nonBlankTags, pickTag, uniqueById, unsupportedOperation } from './downloader.js';
