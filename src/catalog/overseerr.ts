import type { z } from "zod";
import { CatalogAuthError, CatalogError, describeError } from "../errors.js";
import { logger as rootLogger, type ContextLogger } from "../logger.js";
import { withRetry } from "../retry.js";
import type {
  MatchCandidate,
  MediaType,
  RequestSubmission,
  SeasonState,
  SeasonStatus
} from "../types.js";
import { MAX_SEASON_CHECKED, type CatalogClient } from "./client.js";
import {
  MediaStatus,
  REQUEST_DECLINED,
  authMeSchema,
  movieDetailsSchema,
  requestResponseSchema,
  searchResponseSchema,
  tvDetailsSchema,
  type SearchResult,
  type TvDetails
} from "./schemas.js";

export type OverseerrConfig = {
  baseUrl: string;
  apiKey: string;
  is4k: boolean;
  timeoutMs: number;
  retryCount: number;
  retryBackoffMs: number;
};

export type OverseerrDeps = {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: ContextLogger;
};

type HttpResult = {
  status: number;
  body: string;
};

const requestedStatuses = new Set<number>([
  MediaStatus.PENDING,
  MediaStatus.PROCESSING,
  MediaStatus.PARTIALLY_AVAILABLE,
  MediaStatus.AVAILABLE
]);

export function createOverseerrClient(
  config: OverseerrConfig,
  deps: OverseerrDeps = {}
): CatalogClient {
  const fetchImpl = deps.fetch ?? globalThis.fetch;
  const log = (deps.logger ?? rootLogger).withContext({ component: "overseerr" });

  async function send(method: "GET" | "POST", path: string, payload?: unknown) {
    const url = buildApiUrl(config.baseUrl, path);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.timeoutMs);
    let res: Response;
    try {
      res = await fetchImpl(url, {
        method,
        headers: {
          Accept: "application/json",
          "X-Api-Key": config.apiKey,
          ...(payload === undefined ? {} : { "Content-Type": "application/json" })
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: controller.signal
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${config.timeoutMs}ms`
        : describeError(error);
      throw new CatalogError(`${method} ${path} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    const body = await res.text().catch(() => "");
    if (isAuthFailure(res.status, body)) {
      throw new CatalogAuthError(
        `${method} ${path} rejected: HTTP ${res.status} (check OVERSEERR_API_KEY)`,
        { status: res.status, body }
      );
    }
    if (res.status >= 500) {
      throw new CatalogError(`${method} ${path} failed: HTTP ${res.status} ${body}`.trim(), {
        status: res.status,
        body
      });
    }
    return { status: res.status, body };
  }

  // GETs only. A POST /request that timed out or got a 5xx may still have been created.
  function get(path: string) {
    return withRetry<HttpResult>(() => send("GET", path), {
      retries: config.retryCount,
      backoffMs: config.retryBackoffMs,
      sleep: deps.sleep,
      shouldRetry: isTransient,
      onRetry: (error, attempt, waitMs) =>
        log.warn("catalog.retry", {
          method: "GET",
          path,
          attempt,
          waitMs,
          error: describeError(error)
        })
    });
  }

  async function getJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S
  ): Promise<z.output<S>> {
    const result = await get(path);
    if (result.status < 200 || result.status >= 300) {
      throw new CatalogError(
        `GET ${path} failed: HTTP ${result.status} ${extractMessage(result.body)}`.trim(),
        { status: result.status, body: result.body }
      );
    }
    return parseBody(path, result.body, schema);
  }

  async function submit(payload: Record<string, unknown>): Promise<RequestSubmission> {
    const result = await send("POST", "/request", payload);
    const message = extractMessage(result.body);
    if (result.status >= 200 && result.status < 300) {
      if (/no seasons available/i.test(message)) {
        return { status: "exists" };
      }
      const parsed = requestResponseSchema.safeParse(safeJson(result.body));
      return {
        status: "requested",
        requestId: parsed.success ? parsed.data.id ?? null : null
      };
    }
    if (isDuplicateLike(result.status, message)) {
      return { status: "exists" };
    }
    throw new CatalogError(
      `POST /request failed: HTTP ${result.status} ${message}`.trim(),
      { status: result.status, body: result.body }
    );
  }

  return {
    async search(title: string, mediaType: MediaType) {
      const path = `/search?query=${encodeQuery(title)}&page=1&language=en`;
      const data = await getJson(path, searchResponseSchema);
      const candidates = data.results
        .map(toCandidate)
        .filter((candidate): candidate is MatchCandidate => candidate !== null)
        .filter((candidate) => candidate.mediaType === mediaType);
      log.debug("catalog.search", {
        title,
        mediaType,
        results: data.results.length,
        candidates: candidates.length
      });
      return candidates;
    },

    async getMovieStatus(catalogId: number) {
      const details = await getJson(`/movie/${catalogId}`, movieDetailsSchema);
      const status = details.mediaInfo?.status;
      return status !== undefined && requestedStatuses.has(status);
    },

    async getSeasonStatuses(catalogId: number) {
      const details = await getJson(`/tv/${catalogId}`, tvDetailsSchema);
      return toSeasonStatuses(details);
    },

    requestMovie(catalogId: number) {
      return submit({ mediaType: "movie", mediaId: catalogId, is4k: config.is4k });
    },

    requestShowSeason(catalogId: number, seasonNumber: number) {
      return submit({
        mediaType: "tv",
        mediaId: catalogId,
        is4k: config.is4k,
        seasons: [seasonNumber]
      });
    },

    async testConnection() {
      const me = await getJson("/auth/me", authMeSchema);
      return { userId: me.id, displayName: me.displayName ?? me.email };
    }
  };
}

export function toCandidate(result: SearchResult): MatchCandidate | null {
  const mediaType = toMediaType(result.mediaType);
  const title = result.title ?? result.name;
  if (!mediaType || !title) return null;
  const date = result.releaseDate || result.firstAirDate || undefined;
  return {
    catalogId: result.id,
    mediaType,
    title,
    ...(date && /^\d{4}-\d{2}-\d{2}/.test(date) ? { releaseDate: date.slice(0, 10) } : {})
  };
}

export function toSeasonStatuses(details: TvDetails): SeasonStatus[] {
  const existing = new Set(details.seasons.map((season) => season.seasonNumber));
  const statuses: SeasonStatus[] = [];
  for (let seasonNumber = 1; seasonNumber <= MAX_SEASON_CHECKED; seasonNumber += 1) {
    if (!existing.has(seasonNumber)) continue;
    statuses.push({ seasonNumber, state: seasonState(details, seasonNumber) });
  }
  return statuses;
}

function seasonState(details: TvDetails, seasonNumber: number): SeasonState {
  const info = details.mediaInfo;
  const season = info?.seasons?.find((item) => item.seasonNumber === seasonNumber);
  if (
    season?.status === MediaStatus.AVAILABLE ||
    season?.status === MediaStatus.PARTIALLY_AVAILABLE
  ) {
    return "available";
  }
  if (season?.status === MediaStatus.PENDING || season?.status === MediaStatus.PROCESSING) {
    return "requestedOrProcessing";
  }
  const requested = (info?.requests ?? []).some(
    (request) =>
      request.status !== REQUEST_DECLINED &&
      (request.seasons ?? []).some((item) => item.seasonNumber === seasonNumber)
  );
  return requested ? "requestedOrProcessing" : "unavailable";
}

function toMediaType(value: string): MediaType | null {
  if (value === "movie") return "movie";
  if (value === "tv") return "show";
  return null;
}

function parseBody<S extends z.ZodTypeAny>(path: string, body: string, schema: S): z.output<S> {
  const json = safeJson(body);
  if (json === undefined) {
    throw new CatalogError(`GET ${path} returned invalid JSON`, { body });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new CatalogError(
      `GET ${path} returned an unexpected shape: ${where} ${issue?.message ?? ""}`.trim(),
      { body }
    );
  }
  return parsed.data;
}

function safeJson(body: string): unknown {
  if (!body) return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function extractMessage(body: string) {
  const json = safeJson(body);
  if (json && typeof json === "object" && "message" in json && typeof json.message === "string") {
    return json.message;
  }
  return body.slice(0, 300);
}

function isAuthFailure(status: number, body: string) {
  if (status === 401) return true;
  // Overseerr also answers 403 for exhausted request quotas; those are per-item.
  return status === 403 && !/quota|blacklist/i.test(body);
}

function isTransient(error: unknown) {
  if (!(error instanceof CatalogError) || error instanceof CatalogAuthError) {
    return false;
  }
  return error.status === undefined || error.status >= 500;
}

function isDuplicateLike(status: number, message: string) {
  if (status === 409) return true;
  if (![400, 422].includes(status)) return false;
  const lower = message.toLowerCase();
  return (
    lower.includes("already") ||
    lower.includes("exists") ||
    lower.includes("duplicate") ||
    lower.includes("no seasons available")
  );
}

/** Overseerr rejects reserved characters that `encodeURIComponent` leaves alone. */
export function encodeQuery(value: string) {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function buildApiUrl(baseUrlRaw: string, path: string) {
  const trimmed = baseUrlRaw.trim();
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  const parsed = new URL(withScheme);
  const rootPath = parsed.pathname.replace(/\/+$/, "").replace(/\/api\/v1$/i, "");
  parsed.pathname = `${rootPath}/`;
  parsed.search = "";
  return new URL(`api/v1/${path.replace(/^\/+/, "")}`, parsed.toString()).toString();
}
