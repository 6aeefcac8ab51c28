// src/adapters/mdblist/types.ts

import { z } from 'zod';

export const MdbListItemIdsSchema = z.object({
  imdb: z.string().nullish(),
  tmdb: z.number().nullish(),
  tvdb: z.number().nullish(),
  mdblist: z.string().nullish(),
});

export const MdbListItemSchema = z.object({
  id: z.number().nullish(),
  rank: z.number().nullish(),
  title: z.string().nullish(),
  imdb_id: z.string().nullish(),
  tvdb_id: z.number().nullish(),
  mediatype: z.string().nullish(),
  release_year: z.number().nullish(),
  ids: MdbListItemIdsSchema.nullish(),
});

/**
 * Newer responses split items into "movies" and "shows"
 */
export const MdbListResponseSchema = z.object({
  movies: z.array(MdbListItemSchema).nullish(),
  shows: z.array(MdbListItemSchema).nullish(),
});

/**
 * Older responses and some endpoints return the items directly
 */
export const MdbListItemArraySchema = z.array(MdbListItemSchema);

export type MdbListItem = z.infer<typeof MdbListItemSchema>;

export interface MdbListOptions {
  apiKey?: string;
}
