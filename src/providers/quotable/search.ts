/**
 * Quotable search inputs
 *
 * Callers pass plain objects; each service method validates them against
 * the schema here and works with the parsed, defaulted result.
 */

import { z } from 'zod';
import { QUOTABLE } from '../../config/apis.js';
import { TagExpression } from './tag-expression.js';

export const QuoteSortBySchema = z.enum(['dateAdded', 'dateModified', 'author', 'content']);
export const SortBySchema = z.enum(['name', 'dateAdded', 'dateModified', 'quoteCount']);
export const SortOrderSchema = z.enum(['asc', 'desc']);

export type QuoteSortBy = z.infer<typeof QuoteSortBySchema>;
export type SortBy = z.infer<typeof SortBySchema>;
export type SortOrder = z.infer<typeof SortOrderSchema>;

export const QUOTE_SEARCH_FIELDS = ['content', 'author', 'tags'] as const;
export type QuoteSearchField = (typeof QUOTE_SEARCH_FIELDS)[number];

/**
 * Order the API applies when a sort field is given without one
 */
export function defaultSortOrder(sortBy: QuoteSortBy | SortBy): SortOrder {
  switch (sortBy) {
    case 'name':
    case 'author':
    case 'content':
      return 'asc';
    case 'dateAdded':
    case 'dateModified':
    case 'quoteCount':
      return 'desc';
  }
}

// ============================================================================
// Shared fields
// ============================================================================

const page = z.number().int().min(1).default(1);
const limit = z.number().int().min(1).max(QUOTABLE.resultsPerPageMax).default(QUOTABLE.resultsPerPageDefault);
const slugList = z.array(z.string().trim().min(1)).default([]);

// a TagExpression, or a raw expression such as "love|wisdom"
const tagsField = z
  .union([
    z.custom<TagExpression>((value) => value instanceof TagExpression, 'must be a TagExpression'),
    z.string().trim().min(1),
  ])
  .optional();

const quoteFilterShape = {
  minLength: z.number().int().nonnegative().default(0),
  maxLength: z.number().int().positive().optional(),
  tags: tagsField,
  authors: slugList,
};

function lengthsOrdered(search: { minLength: number; maxLength?: number }): boolean {
  return search.maxLength === undefined || search.maxLength >= search.minLength;
}

const lengthsMessage = {
  message: 'must be greater than or equal to minLength',
  path: ['maxLength'],
};

// ============================================================================
// Schemas
// ============================================================================

export const QuoteSearchSchema = z.object(quoteFilterShape).refine(lengthsOrdered, lengthsMessage);

export const QuoteListSearchSchema = z
  .object({
    ...quoteFilterShape,
    page,
    limit,
    sortBy: QuoteSortBySchema.optional(),
    order: SortOrderSchema.optional(),
  })
  .refine(lengthsOrdered, lengthsMessage);

export const AuthorSearchSchema = z.object({
  slugs: slugList,
  page,
  limit,
  sortBy: SortBySchema.optional(),
  order: SortOrderSchema.optional(),
});

export const TagSearchSchema = z.object({
  sortBy: SortBySchema.optional(),
  order: SortOrderSchema.optional(),
});

export const QuoteContentSearchSchema = z.object({
  query: z.string().trim().min(1),
  fields: z
    .array(z.enum(QUOTE_SEARCH_FIELDS))
    .min(1)
    .default([...QUOTE_SEARCH_FIELDS])
    .transform((fields) => [...new Set(fields)]),
  fuzzyMaxEdits: z.number().int().min(0).max(2).default(0),
  fuzzyMaxExpansions: z
    .number()
    .int()
    .min(0)
    .max(QUOTABLE.fuzzyMaxExpansionsMax)
    .default(QUOTABLE.fuzzyMaxExpansionsDefault),
  page,
  limit,
});

export const AuthorNameSearchSchema = z.object({
  query: z.string().trim().min(1),
  autocomplete: z.boolean().default(true),
  matchThreshold: z.number().int().min(1).max(3).default(2),
  page,
  limit,
});

export type QuoteSearchInput = z.input<typeof QuoteSearchSchema>;
export type QuoteSearch = z.output<typeof QuoteSearchSchema>;
export type QuoteListSearchInput = z.input<typeof QuoteListSearchSchema>;
export type QuoteListSearch = z.output<typeof QuoteListSearchSchema>;
export type AuthorSearchInput = z.input<typeof AuthorSearchSchema>;
export type AuthorSearch = z.output<typeof AuthorSearchSchema>;
export type TagSearchInput = z.input<typeof TagSearchSchema>;
export type TagSearch = z.output<typeof TagSearchSchema>;
export type QuoteContentSearchInput = z.input<typeof QuoteContentSearchSchema>;
export type QuoteContentSearch = z.output<typeof QuoteContentSearchSchema>;
export type AuthorNameSearchInput = z.input<typeof AuthorNameSearchSchema>;
export type AuthorNameSearch = z.output<typeof AuthorNameSearchSchema>;
