/**
 * Tronald Dump response models
 *
 * HAL-style documents: related resources live under `_embedded`, links
 * under `_links`. Timestamps stay ISO strings until conversion.
 */

import { z } from 'zod';

export const LinkSchema = z.object({
  href: z.string().min(1),
});

export const SelfLinkSchema = z.object({
  self: LinkSchema,
});

export const PageLinksSchema = z.object({
  self: LinkSchema,
  first: LinkSchema.optional(),
  prev: LinkSchema.optional(),
  next: LinkSchema.optional(),
  last: LinkSchema.optional(),
});

export const AuthorModelSchema = z.object({
  author_id: z.string().min(1),
  name: z.string().min(1),
  slug: z.string().min(1),
  bio: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  _links: SelfLinkSchema,
});

export const QuoteSourceModelSchema = z.object({
  quote_source_id: z.string().min(1),
  url: z.string().min(1),
  filename: z.string().nullish(),
  remarks: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  _links: SelfLinkSchema,
});

export const QuoteModelSchema = z.object({
  quote_id: z.string().min(1),
  value: z.string().min(1),
  tags: z.array(z.string()),
  appeared_at: z.string(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  _embedded: z.object({
    author: z.array(AuthorModelSchema),
    source: z.array(QuoteSourceModelSchema),
  }),
  _links: SelfLinkSchema.optional(),
});

export const TagModelSchema = z.object({
  value: z.string().min(1),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  _links: SelfLinkSchema,
});

export const QuoteListModelSchema = z.object({
  quotes: z.array(QuoteModelSchema),
});

export const TagListModelSchema = z.object({
  tag: z.array(TagModelSchema),
});

function searchResult<Embedded extends z.ZodTypeAny>(embedded: Embedded) {
  return z
    .object({
      count: z.number().int().nonnegative(),
      total: z.number().int().nonnegative(),
      _embedded: embedded,
      _links: PageLinksSchema.optional(),
    })
    .refine((result) => result.count <= result.total, {
      message: 'count must not exceed total',
      path: ['count'],
    });
}

export const QuoteSearchResultSchema = searchResult(QuoteListModelSchema);
export const TagSearchResultSchema = searchResult(TagListModelSchema);

export type AuthorModel = z.infer<typeof AuthorModelSchema>;
export type QuoteSourceModel = z.infer<typeof QuoteSourceModelSchema>;
export type QuoteModel = z.infer<typeof QuoteModelSchema>;
export type TagModel = z.infer<typeof TagModelSchema>;
export type QuoteListModel = z.infer<typeof QuoteListModelSchema>;
export type TagListModel = z.infer<typeof TagListModelSchema>;
export type QuoteSearchResult = z.infer<typeof QuoteSearchResultSchema>;
export type TagSearchResult = z.infer<typeof TagSearchResultSchema>;

/** Anything carrying a total item count */
export interface Paged {
  readonly total: number;
}
