export type {
  FatalRunError,
  MatchCandidate,
  MatchResult,
  MediaType,
  OutcomeCounts,
  OutcomeKind,
  RequestOutcome,
  RequestSubmission,
  RunSummary,
  SeasonState,
  SeasonStatus,
  SourceEntry
} from "./types.js";
export { CatalogAuthError, CatalogError, ConfigError, SourceError } from "./errors.js";
export { MAX_SEASON_CHECKED, type CatalogClient } from "./catalog/client.js";
export { createOverseerrClient, type OverseerrConfig } from "./catalog/overseerr.js";
export { normalizeTitle, titleKey } from "./engine/normalize.js";
export { createTitleMatcher, pickCandidate, type TitleMatcher } from "./engine/matcher.js";
export { selectSeason } from "./engine/season-selector.js";
export { formatSummaryLine, summarize } from "./engine/aggregator.js";
export {
  createRequestOrchestrator,
  type RequestOrchestrator
} from "./engine/orchestrator.js";
export { fetchTopTen, parseTopTenTsv, selectTopTen } from "./source/netflix.js";
export { loadConfig, type AppConfig } from "./config.js";
export { runOnce, type RunOnceOptions } from "./runner/run-once.js";
export { nextRunAt, runForever, type ScheduleConfig } from "./scheduler.js";
