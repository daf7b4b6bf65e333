import { formatSummaryLine } from "../engine/aggregator.js";
import type { ContextLogger } from "../logger.js";
import type { FatalRunError, OutcomeCounts, OutcomeKind, RunSummary } from "../types.js";

export type RunReport = {
  schemaVersion: number;
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  dryRun: boolean;
  countries: string[];
  total: number;
  skipped: number;
  counts: OutcomeCounts;
  fatalError?: FatalRunError;
  outcomes: {
    rank: number;
    title: string;
    mediaType: string;
    country: string;
    outcome: OutcomeKind;
    detail: string;
    catalogId: number | null;
    seasonNumber: number | null;
  }[];
};

export function buildRunId(startedAt: Date) {
  return startedAt.toISOString().replace(/\.\d{3}Z$/, "Z").replace(/:/g, "-");
}

export function buildSummaryKey(prefix: string, runId: string) {
  return `${prefix}/runs/${runId}/summary.json`;
}

export function buildRunReport(
  summary: RunSummary,
  meta: { runId: string; startedAt: Date; finishedAt: Date; countries: string[] }
): RunReport {
  return {
    schemaVersion: 1,
    runId: meta.runId,
    startedAt: meta.startedAt.toISOString(),
    finishedAt: meta.finishedAt.toISOString(),
    durationMs: meta.finishedAt.getTime() - meta.startedAt.getTime(),
    dryRun: summary.dryRun,
    countries: meta.countries,
    total: summary.total,
    skipped: summary.skipped,
    counts: summary.counts,
    ...(summary.fatalError ? { fatalError: summary.fatalError } : {}),
    outcomes: summary.outcomes.map((item) => ({
      rank: item.sourceEntry.rank,
      title: item.sourceEntry.title,
      mediaType: item.sourceEntry.mediaType,
      country: item.sourceEntry.country,
      outcome: item.outcome,
      detail: item.detail,
      catalogId: item.catalogId ?? null,
      seasonNumber: item.seasonNumber ?? null
    }))
  };
}

export function logRunSummary(summary: RunSummary, logger: ContextLogger) {
  if (summary.fatalError) {
    logger.error("run.aborted", {
      kind: summary.fatalError.kind,
      error: summary.fatalError.message
    });
  }
  logger.info("run.summary", {
    summary: formatSummaryLine(summary),
    dryRun: summary.dryRun,
    total: summary.total,
    skipped: summary.skipped,
    ...summary.counts
  });
}
