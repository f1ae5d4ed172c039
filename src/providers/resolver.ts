import { HttpResolver } from '../resolvers/http-resolver.js';
import type { ResourceResolver, StreamResolver } from '../resolvers/types.js';
import type { ProviderOptions } from './types.js';

/**
 * The caller's resolver, or an HttpResolver for the provider's base address
 */
export function resolverFor(baseUrl: string, name: string, options: ProviderOptions = {}): ResourceResolver {
  return (
    options.resolver ??
    new HttpResolver({ baseUrl, name, fetchFn: options.fetchFn, config: options.config })
  );
}

export function isStreamResolver(resolver: ResourceResolver): resolver is StreamResolver {
  return 'resolveBytes' in resolver && typeof resolver.resolveBytes === 'function';
}
