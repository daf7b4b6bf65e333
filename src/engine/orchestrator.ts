import { setTimeout as delay } from "node:timers/promises";
import type { CatalogClient } from "../catalog/client.js";
import { CatalogAuthError, describeError } from "../errors.js";
import type { ContextLogger } from "../logger.js";
import type {
  FatalRunError,
  OutcomeKind,
  RequestOutcome,
  RunSummary,
  SourceEntry
} from "../types.js";
import { summarize } from "./aggregator.js";
import { createTitleMatcher, type TitleMatcher } from "./matcher.js";
import { selectSeason } from "./season-selector.js";

export const DEFAULT_REQUEST_DELAY_MS = 1000;

export const ABORTED_DETAIL = "not processed: run aborted after authentication failure";

export type RequestOrchestrator = {
  run: (entries: readonly SourceEntry[], options: { dryRun: boolean }) => Promise<RunSummary>;
};

export type OrchestratorDeps = {
  catalog: CatalogClient;
  logger: ContextLogger;
  matcher?: TitleMatcher;
  delayMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
};

type Resolved = {
  catalogId?: number;
  seasonNumber?: number;
};

export function createRequestOrchestrator(deps: OrchestratorDeps): RequestOrchestrator {
  const { catalog, logger } = deps;
  const matcher = deps.matcher ?? createTitleMatcher({ catalog, logger });
  const delayMs = deps.delayMs ?? DEFAULT_REQUEST_DELAY_MS;
  const sleep = deps.sleep ?? delay;

  async function processEntry(
    entry: SourceEntry,
    dryRun: boolean,
    resolved: Resolved
  ): Promise<RequestOutcome> {
    const match = await matcher.match(entry);
    if (!match.candidate) {
      return makeOutcome(entry, "notFound", `no ${entry.mediaType} match in catalog`, dryRun);
    }
    const catalogId = match.candidate.catalogId;
    resolved.catalogId = catalogId;

    if (entry.mediaType === "movie") {
      if (await catalog.getMovieStatus(catalogId)) {
        return makeOutcome(entry, "alreadySatisfied", "movie already requested or available", dryRun, resolved);
      }
      if (dryRun) {
        return makeOutcome(entry, "requested", "dry run: would request movie", dryRun, resolved);
      }
      const submission = await catalog.requestMovie(catalogId);
      if (submission.status === "exists") {
        return makeOutcome(entry, "alreadySatisfied", "movie request already exists", dryRun, resolved);
      }
      return makeOutcome(entry, "requested", withRequestId("movie requested", submission.requestId), dryRun, resolved);
    }

    const statuses = await catalog.getSeasonStatuses(catalogId);
    const seasonNumber = selectSeason(statuses);
    if (seasonNumber === null) {
      const detail =
        statuses.length === 0
          ? "no requestable seasons in catalog"
          : `seasons ${statuses.map((item) => item.seasonNumber).join(", ")} already available or requested`;
      return makeOutcome(entry, "alreadySatisfied", detail, dryRun, resolved);
    }
    resolved.seasonNumber = seasonNumber;

    if (dryRun) {
      return makeOutcome(entry, "requested", `dry run: would request season ${seasonNumber}`, dryRun, resolved);
    }
    const submission = await catalog.requestShowSeason(catalogId, seasonNumber);
    if (submission.status === "exists") {
      return makeOutcome(entry, "alreadySatisfied", `season ${seasonNumber} request already exists`, dryRun, resolved);
    }
    return makeOutcome(
      entry,
      "requested",
      withRequestId(`season ${seasonNumber} requested`, submission.requestId),
      dryRun,
      resolved
    );
  }

  return {
    async run(entries, options) {
      const { dryRun } = options;
      const outcomes: RequestOutcome[] = [];
      let fatalError: FatalRunError | undefined;

      logger.info("run.entries", { count: entries.length, dryRun, delayMs });

      for (let index = 0; index < entries.length; index += 1) {
        const entry = entries[index];
        const entryLogger = logger.withContext({
          rank: entry.rank,
          title: entry.title,
          mediaType: entry.mediaType,
          country: entry.country
        });
        const resolved: Resolved = {};

        entryLogger.debug("entry.start");
        try {
          const outcome = await processEntry(entry, dryRun, resolved);
          outcomes.push(outcome);
          entryLogger.info("entry.outcome", {
            outcome: outcome.outcome,
            detail: outcome.detail,
            catalogId: outcome.catalogId ?? null,
            seasonNumber: outcome.seasonNumber ?? null
          });
        } catch (error) {
          const detail = describeError(error);
          outcomes.push(makeOutcome(entry, "error", detail, dryRun, resolved));

          if (error instanceof CatalogAuthError) {
            fatalError = { kind: "auth", message: detail };
            entryLogger.error("run.fatal", { error: detail, remaining: entries.length - index - 1 });
            for (const rest of entries.slice(index + 1)) {
              outcomes.push(makeOutcome(rest, "error", ABORTED_DETAIL, dryRun));
            }
            break;
          }
          entryLogger.warn("entry.error", {
            error: detail,
            catalogId: resolved.catalogId ?? null,
            seasonNumber: resolved.seasonNumber ?? null
          });
        }

        if (index < entries.length - 1) {
          await sleep(delayMs);
        }
      }

      return summarize(outcomes, { dryRun, fatalError });
    }
  };
}

function makeOutcome(
  entry: SourceEntry,
  outcome: OutcomeKind,
  detail: string,
  dryRun: boolean,
  resolved: Resolved = {}
): RequestOutcome {
  return Object.freeze({
    sourceEntry: entry,
    outcome,
    detail,
    dryRun,
    ...(resolved.catalogId === undefined ? {} : { catalogId: resolved.catalogId }),
    ...(resolved.seasonNumber === undefined ? {} : { seasonNumber: resolved.seasonNumber })
  });
}

function withRequestId(detail: string, requestId: number | null) {
  return requestId === null ? detail : `${detail} (request #${requestId})`;
}
