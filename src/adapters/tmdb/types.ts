// src/adapters/tmdb/types.ts

import { z } from 'zod';

export const TmdbItemSchema = z.object({
  id: z.number().nullish(),
  title: z.string().nullish(),
  name: z.string().nullish(),
  media_type: z.string().nullish(),
});

/**
 * /list/{id}
 */
export const TmdbListResponseSchema = z.object({
  items: z.array(TmdbItemSchema).nullish(),
  total_pages: z.number().nullish(),
  total_results: z.number().nullish(),
});

/**
 * Charts and trending feeds
 */
export const TmdbPageResponseSchema = z.object({
  results: z.array(TmdbItemSchema).nullish(),
  page: z.number().nullish(),
  total_pages: z.number().nullish(),
  total_results: z.number().nullish(),
});

export type TmdbItem = z.infer<typeof TmdbItemSchema>;

export type TmdbRouteKind = 'userList' | 'chart';

export interface TmdbRoute {
  apiPath: string;
  kind: TmdbRouteKind;
}

export interface TmdbListOptions {
  apiKey?: string;
}
