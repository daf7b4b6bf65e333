import type {
  MatchCandidate,
  MediaType,
  RequestSubmission,
  SeasonStatus
} from "../types.js";

/**
 * Read and request operations the engine needs from the media-request
 * service. Implementations throw `CatalogError` on failure and
 * `CatalogAuthError` when the service rejects the credentials.
 */
export type CatalogClient = {
  search: (title: string, mediaType: MediaType) => Promise<MatchCandidate[]>;
  /** Live status of seasons 1..3 that exist for the show, ascending. */
  getSeasonStatuses: (catalogId: number) => Promise<SeasonStatus[]>;
  /** True when the movie is already requested, processing or available. */
  getMovieStatus: (catalogId: number) => Promise<boolean>;
  requestMovie: (catalogId: number) => Promise<RequestSubmission>;
  requestShowSeason: (
    catalogId: number,
    seasonNumber: number
  ) => Promise<RequestSubmission>;
  testConnection: () => Promise<{ userId?: number; displayName?: string }>;
};

/** Seasons beyond this are never checked or requested. */
export const MAX_SEASON_CHECKED = 3;
