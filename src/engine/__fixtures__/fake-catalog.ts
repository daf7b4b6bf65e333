import type { CatalogClient } from "../../catalog/client.js";
import type { ContextLogger } from "../../logger.js";
import type { MatchCandidate, MediaType, SeasonState } from "../../types.js";

export type FakeMovie = {
  id: number;
  title: string;
  releaseDate?: string;
  requested?: boolean;
};

export type FakeShow = {
  id: number;
  title: string;
  releaseDate?: string;
  /** Index 0 is season 1. */
  seasons: SeasonState[];
};

export type Submission = {
  mediaType: MediaType;
  catalogId: number;
  seasonNumber?: number;
};

/**
 * In-process catalog that applies submissions to its own state, so a second
 * run sees what the first one requested.
 */
export function createFakeCatalog(seed: { movies?: FakeMovie[]; shows?: FakeShow[] }) {
  const movies = (seed.movies ?? []).map((movie) => ({ ...movie }));
  const shows = (seed.shows ?? []).map((show) => ({ ...show, seasons: [...show.seasons] }));
  const submissions: Submission[] = [];
  let nextRequestId = 100;

  const catalog: CatalogClient = {
    async search(title, mediaType) {
      const wanted = title.toLowerCase();
      const pool: MatchCandidate[] =
        mediaType === "movie"
          ? movies.map((movie) => toCandidate(movie, "movie"))
          : shows.map((show) => toCandidate(show, "show"));
      return pool.filter((candidate) => candidate.title.toLowerCase().includes(wanted));
    },

    async getMovieStatus(catalogId) {
      return Boolean(findMovie(catalogId).requested);
    },

    async getSeasonStatuses(catalogId) {
      return findShow(catalogId)
        .seasons.slice(0, 3)
        .map((state, index) => ({ seasonNumber: index + 1, state }));
    },

    async requestMovie(catalogId) {
      const movie = findMovie(catalogId);
      if (movie.requested) return { status: "exists" };
      movie.requested = true;
      submissions.push({ mediaType: "movie", catalogId });
      return { status: "requested", requestId: nextRequestId++ };
    },

    async requestShowSeason(catalogId, seasonNumber) {
      const show = findShow(catalogId);
      if (show.seasons[seasonNumber - 1] !== "unavailable") return { status: "exists" };
      show.seasons[seasonNumber - 1] = "requestedOrProcessing";
      submissions.push({ mediaType: "show", catalogId, seasonNumber });
      return { status: "requested", requestId: nextRequestId++ };
    },

    async testConnection() {
      return { userId: 1, displayName: "test-user" };
    }
  };

  function findMovie(catalogId: number) {
    const movie = movies.find((item) => item.id === catalogId);
    if (!movie) throw new Error(`unknown movie ${catalogId}`);
    return movie;
  }

  function findShow(catalogId: number) {
    const show = shows.find((item) => item.id === catalogId);
    if (!show) throw new Error(`unknown show ${catalogId}`);
    return show;
  }

  return { catalog, submissions };
}

function toCandidate(item: FakeMovie | FakeShow, mediaType: MediaType): MatchCandidate {
  return {
    catalogId: item.id,
    mediaType,
    title: item.title,
    ...(item.releaseDate ? { releaseDate: item.releaseDate } : {})
  };
}

export const silentLogger: ContextLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  withContext: () => silentLogger
};
