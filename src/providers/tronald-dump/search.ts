import { z } from 'zod';

const phrase = z.string().trim().min(1);

/**
 * Full-text and/or tag search. `query` may be a list of phrases; they are
 * sent space separated, which encodes as `+` on the wire.
 */
export const QuoteSearchSchema = z
  .object({
    query: z
      .union([phrase, z.array(phrase).min(1)])
      .optional()
      .transform((query) => (Array.isArray(query) ? query.join(' ') : query)),
    tag: z.string().trim().min(1).optional(),
    /** Zero-based */
    page: z.number().int().nonnegative().default(0),
  })
  .refine((search) => search.query !== undefined || search.tag !== undefined, {
    message: 'either query or tag must be provided',
  });

export type QuoteSearchInput = z.input<typeof QuoteSearchSchema>;
export type QuoteSearch = z.output<typeof QuoteSearchSchema>;
