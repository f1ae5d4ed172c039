/**
 * Quotable response models
 *
 * Shapes returned by https://api.quotable.io. Dates arrive as ISO strings
 * ("2023-04-14") and stay strings until conversion.
 */

import { z } from 'zod';
import { QUOTABLE } from '../../config/apis.js';

export const QuoteModelSchema = z.object({
  _id: z.string().min(1),
  content: z.string().min(1),
  author: z.string().min(1),
  authorSlug: z.string(),
  tags: z.array(z.string()),
  length: z.number().int().nonnegative(),
  dateAdded: z.string(),
  dateModified: z.string(),
});

export const AuthorModelSchema = z.object({
  _id: z.string().min(1),
  name: z.string().min(1),
  slug: z.string().min(1),
  link: z.string().optional(),
  bio: z.string().optional(),
  description: z.string().optional(),
  quoteCount: z.number().int().nonnegative(),
  dateAdded: z.string(),
  dateModified: z.string(),
});

export const TagModelSchema = z.object({
  _id: z.string().min(1),
  name: z.string().min(1),
  quoteCount: z.number().int().nonnegative(),
  dateAdded: z.string(),
  dateModified: z.string(),
  __v: z.number().int().optional(),
});

export const TagListSchema = z.array(TagModelSchema);

function searchResult<Item extends z.ZodTypeAny>(item: Item) {
  return z
    .object({
      count: z.number().int().nonnegative(),
      totalCount: z.number().int().nonnegative(),
      page: z.number().int().min(1),
      totalPages: z.number().int().nonnegative(),
      lastItemIndex: z.number().int().nullish(),
      results: z.array(item).max(QUOTABLE.resultsPerPageMax),
    })
    .refine((result) => result.count <= result.totalCount, {
      message: 'count must not exceed totalCount',
      path: ['count'],
    });
}

export const QuoteSearchResultSchema = searchResult(QuoteModelSchema);
export const AuthorSearchResultSchema = searchResult(AuthorModelSchema);

export type QuoteModel = z.infer<typeof QuoteModelSchema>;
export type AuthorModel = z.infer<typeof AuthorModelSchema>;
export type TagModel = z.infer<typeof TagModelSchema>;
export type QuoteSearchResult = z.infer<typeof QuoteSearchResultSchema>;
export type AuthorSearchResult = z.infer<typeof AuthorSearchResultSchema>;
