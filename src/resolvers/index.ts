export { HttpResolver, type HttpResolverOptions, type FetchFn } from './http-resolver.js';
export { applyQuery, type ResourceResolver, type StreamResolver, type Schema } from './types.js';
