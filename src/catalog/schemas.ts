import { z } from "zod";

// Overseerr / Jellyseerr MediaStatus values.
export const MediaStatus = {
  UNKNOWN: 1,
  PENDING: 2,
  PROCESSING: 3,
  PARTIALLY_AVAILABLE: 4,
  AVAILABLE: 5
} as const;

// MediaRequestStatus: 3 is declined, every other value still counts as live.
export const REQUEST_DECLINED = 3;

const searchResultSchema = z
  .object({
    id: z.number().int(),
    mediaType: z.string(),
    title: z.string().optional(),
    name: z.string().optional(),
    releaseDate: z.string().optional().nullable(),
    firstAirDate: z.string().optional().nullable()
  })
  .passthrough();

export const searchResponseSchema = z.object({
  page: z.number().optional(),
  totalResults: z.number().optional(),
  results: z.array(searchResultSchema).default([])
});

export type SearchResult = z.infer<typeof searchResultSchema>;

const seasonInfoSchema = z.object({
  seasonNumber: z.number().int(),
  status: z.number().int()
});

const requestInfoSchema = z.object({
  status: z.number().int(),
  seasons: z.array(z.object({ seasonNumber: z.number().int() })).optional()
});

const mediaInfoSchema = z
  .object({
    status: z.number().int(),
    seasons: z.array(seasonInfoSchema).optional(),
    requests: z.array(requestInfoSchema).optional()
  })
  .passthrough();

export const movieDetailsSchema = z.object({
  id: z.number().int(),
  title: z.string().optional(),
  mediaInfo: mediaInfoSchema.optional().nullable()
});

export const tvDetailsSchema = z.object({
  id: z.number().int(),
  name: z.string().optional(),
  seasons: z
    .array(z.object({ seasonNumber: z.number().int() }).passthrough())
    .default([]),
  mediaInfo: mediaInfoSchema.optional().nullable()
});

export type TvDetails = z.infer<typeof tvDetailsSchema>;

export const requestResponseSchema = z
  .object({ id: z.number().int().optional() })
  .passthrough();

export const authMeSchema = z
  .object({
    id: z.number().int().optional(),
    displayName: z.string().optional(),
    email: z.string().optional()
  })
  .passthrough();
