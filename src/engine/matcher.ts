import type { CatalogClient } from "../catalog/client.js";
import type { ContextLogger } from "../logger.js";
import type { MatchCandidate, MatchResult, SourceEntry } from "../types.js";
import { normalizeTitle, titleKey } from "./normalize.js";

export type TitleMatcher = {
  match: (entry: SourceEntry) => Promise<MatchResult>;
};

export function createTitleMatcher(deps: {
  catalog: Pick<CatalogClient, "search">;
  logger: ContextLogger;
}): TitleMatcher {
  const { catalog, logger } = deps;

  return {
    async match(entry) {
      const query = normalizeTitle(entry.title);
      const candidates = await catalog.search(query, entry.mediaType);
      const result = pickCandidate(entry, candidates);

      if (!result.candidate) {
        logger.info("match.none", {
          title: entry.title,
          mediaType: entry.mediaType,
          candidates: candidates.length
        });
        return result;
      }
      logger.info(result.exact ? "match.exact" : "match.fallback", {
        title: entry.title,
        mediaType: entry.mediaType,
        catalogId: result.candidate.catalogId,
        catalogTitle: result.candidate.title,
        releaseDate: result.candidate.releaseDate ?? null,
        candidates: candidates.length
      });
      return result;
    }
  };
}

/**
 * Exact normalized-title matches of the entry's media type win; otherwise the
 * most recent release of that type. Both paths share the same ordering.
 */
export function pickCandidate(
  entry: SourceEntry,
  candidates: readonly MatchCandidate[]
): MatchResult {
  const sameType = candidates.filter((candidate) => candidate.mediaType === entry.mediaType);
  if (sameType.length === 0) {
    return { sourceEntry: entry, matched: false, exact: false };
  }

  const key = titleKey(entry.title);
  const exact = sameType.filter((candidate) => titleKey(candidate.title) === key);
  const pool = exact.length > 0 ? exact : sameType;
  const [best] = [...pool].sort(compareCandidates);

  return {
    sourceEntry: entry,
    candidate: best,
    matched: true,
    exact: exact.length > 0
  };
}

export function compareCandidates(a: MatchCandidate, b: MatchCandidate) {
  const aTime = releaseTime(a);
  const bTime = releaseTime(b);
  if (aTime !== bTime) {
    if (aTime === null) return 1;
    if (bTime === null) return -1;
    return bTime - aTime;
  }
  return a.catalogId - b.catalogId;
}

function releaseTime(candidate: MatchCandidate) {
  if (!candidate.releaseDate) return null;
  const time = Date.parse(candidate.releaseDate);
  return Number.isNaN(time) ? null : time;
}
