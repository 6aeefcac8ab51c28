// src/adapters/trakt/types.ts

import { z } from 'zod';

export const TraktIdsSchema = z.object({
  trakt: z.number().nullish(),
  slug: z.string().nullish(),
  imdb: z.string().nullish(),
  tmdb: z.number().nullish(),
  tvdb: z.number().nullish(),
});

export const TraktMediaSchema = z.object({
  title: z.string().nullish(),
  year: z.number().nullish(),
  ids: TraktIdsSchema.nullish(),
});

/**
 * List and watchlist items nest the media under "movie" or "show"; some
 * chart shapes put the ids directly on the item.
 */
export const TraktListItemSchema = z.object({
  movie: TraktMediaSchema.nullish(),
  show: TraktMediaSchema.nullish(),
  ids: TraktIdsSchema.nullish(),
});

export const TraktListItemArraySchema = z.array(TraktListItemSchema);

export type TraktIds = z.infer<typeof TraktIdsSchema>;
export type TraktListItem = z.infer<typeof TraktListItemSchema>;

export interface TraktListOptions {
  clientId?: string;
  userAgent?: string;
}
