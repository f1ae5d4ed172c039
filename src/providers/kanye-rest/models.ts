/**
 * kanye.rest response shapes
 */

import { z } from 'zod';

export const KanyeRestResponseSchema = z.object({
  quote: z.string().min(1),
});

/** The static database is a bare array of quote texts */
export const KanyeRestDatabaseSchema = z.array(z.string());

export type KanyeRestResponse = z.infer<typeof KanyeRestResponseSchema>;
