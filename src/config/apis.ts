/**
 * Centralized Quote API Configuration
 *
 * Single source of truth for API names, base URLs and provider limits.
 * Provider modules import from here instead of hard-coding addresses.
 */

/**
 * Names of the built-in quote APIs
 */
export type BuiltInApi = 'kanye.rest' | 'quotable' | 'tronald dump';

export const KANYE_REST = {
  apiName: 'kanye.rest',
  author: 'Kanye West',
  apiPage: 'https://api.kanye.rest',
  database: 'https://raw.githubusercontent.com/ajzbc/kanye.rest/master/quotes.json',
  gitHubPage: 'https://github.com/ajzbc/kanye.rest',
  mainPage: 'https://kanye.rest',
} as const;

export const QUOTABLE = {
  apiName: 'quotable',
  apiPage: 'https://api.quotable.io/',
  docsPage: 'https://github.com/lukePeavey/quotable/blob/master/README.md',
  gitHubPage: 'https://github.com/lukePeavey/quotable',
  resultsPerPageDefault: 20,
  resultsPerPageMax: 150,
  fuzzyMaxExpansionsDefault: 50,
  fuzzyMaxExpansionsMax: 150,
} as const;

export const TRONALD_DUMP = {
  apiName: 'tronald dump',
  author: 'Donald Trump',
  apiPage: 'https://www.tronalddump.io/',
  docsPage: 'https://docs.tronalddump.io/',
  gitHubPage: 'https://github.com/tronalddump-io/tronald-app',
  maxItemsPerPage: 10,
} as const;

export const BUILT_IN_APIS: readonly BuiltInApi[] = [
  KANYE_REST.apiName,
  QUOTABLE.apiName,
  TRONALD_DUMP.apiName,
];
