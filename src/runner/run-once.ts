import type { CatalogClient } from "../catalog/client.js";
import type { AppConfig } from "../config.js";
import { formatSummaryLine, summarize } from "../engine/aggregator.js";
import { titleKey } from "../engine/normalize.js";
import { createRequestOrchestrator } from "../engine/orchestrator.js";
import { describeError } from "../errors.js";
import { logger as rootLogger, withDuration, type ContextLogger } from "../logger.js";
import { buildCollectionFiles } from "../report/collections.js";
import {
  buildRunId,
  buildRunReport,
  buildSummaryKey,
  logRunSummary,
  type RunReport
} from "../report/summary.js";
import { fetchTopTen } from "../source/netflix.js";
import type { StorageClient } from "../storage.js";
import type { RunSummary, SourceEntry, WebhookPayload } from "../types.js";
import {
  buildNotificationText,
  isWebhookConfigured,
  sendWebhook
} from "../webhook.js";

export type RunOnceOptions = {
  dryRun: boolean;
  writeArtifacts: boolean;
  notify: boolean;
  countries?: string[];
  limit?: number;
};

export type RunOnceDeps = {
  config: AppConfig;
  catalog: CatalogClient;
  storage: StorageClient;
  loadEntries?: (countries: string[], limit: number) => Promise<Map<string, SourceEntry[]>>;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: ContextLogger;
  now?: () => Date;
};

export type RunOnceResult = {
  summary: RunSummary;
  report: RunReport;
};

export async function runOnce(deps: RunOnceDeps, options: RunOnceOptions): Promise<RunOnceResult> {
  const { config, catalog, storage } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const runId = buildRunId(startedAt);
  const runLogger = (deps.logger ?? rootLogger).withContext({ runId });
  const countries = options.countries ?? config.top10.countries;
  const limit = options.limit ?? config.top10.limit;

  runLogger.info("run.start", { countries, limit, dryRun: options.dryRun });

  const loadEntries =
    deps.loadEntries ??
    ((wanted: string[], max: number) =>
      fetchTopTen(
        {
          url: config.top10.url,
          countries: wanted,
          limit: max,
          timeoutMs: config.requests.timeoutMs,
          retry: { retries: config.network.retryCount, backoffMs: config.network.retryBackoffMs }
        },
        { fetch: deps.fetch, logger: runLogger }
      ));

  let entriesByCountry = new Map<string, SourceEntry[]>();
  let summary: RunSummary;
  const fetchStart = Date.now();
  try {
    entriesByCountry = await loadEntries(countries, limit);
    runLogger.info("top10.fetch.done", withDuration(fetchStart));
  } catch (error) {
    runLogger.error("top10.fetch.failed", { error: describeError(error) });
  }

  const entries = dedupeEntries([...entriesByCountry.values()].flat());
  if (entries.length === 0) {
    runLogger.warn("run.empty", { countries });
    summary = summarize([], { dryRun: options.dryRun });
  } else {
    const orchestrator = createRequestOrchestrator({
      catalog,
      logger: runLogger,
      delayMs: config.requests.delayMs,
      sleep: deps.sleep
    });
    summary = await orchestrator.run(entries, { dryRun: options.dryRun });
  }

  const finishedAt = now();
  logRunSummary(summary, runLogger);
  const report = buildRunReport(summary, { runId, startedAt, finishedAt, countries });

  let summaryUri: string | undefined;
  if (options.writeArtifacts) {
    summaryUri = await writeArtifacts({
      storage,
      config,
      report,
      summary,
      entriesByCountry,
      generatedAt: finishedAt,
      logger: runLogger
    });
  }

  if (options.notify && isWebhookConfigured(config.webhook)) {
    const payload: WebhookPayload = {
      runId,
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
      dryRun: summary.dryRun,
      countries,
      counts: summary.counts,
      total: summary.total,
      ...(summary.fatalError ? { fatalError: summary.fatalError } : {}),
      ...(summaryUri ? { summaryUri } : {})
    };
    try {
      await sendWebhook(
        config.webhook,
        payload,
        buildNotificationText(payload, formatSummaryLine(summary)),
        deps.fetch
      );
      runLogger.info("notify.sent");
    } catch (error) {
      runLogger.warn("notify.failed", { error: describeError(error) });
    }
  }

  return { summary, report };
}

/** First occurrence wins, so the earliest country and best rank keep the entry. */
export function dedupeEntries(entries: readonly SourceEntry[]) {
  const seen = new Set<string>();
  const result: SourceEntry[] = [];
  for (const entry of entries) {
    const key = `${entry.mediaType}:${titleKey(entry.title)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(entry);
  }
  return result;
}

async function writeArtifacts(args: {
  storage: StorageClient;
  config: AppConfig;
  report: RunReport;
  summary: RunSummary;
  entriesByCountry: Map<string, SourceEntry[]>;
  generatedAt: Date;
  logger: ContextLogger;
}) {
  const { storage, config, report, summary, logger } = args;
  let summaryUri: string | undefined;

  try {
    const stored = await storage.put(
      buildSummaryKey(config.output.prefix, report.runId),
      JSON.stringify(report, null, 2),
      "application/json"
    );
    summaryUri = stored?.uri;
    if (stored) logger.info("artifact.summary.written", { uri: stored.uri, size: stored.size });
  } catch (error) {
    logger.warn("artifact.summary.failed", { error: describeError(error) });
  }

  if (!config.output.collections || summary.fatalError) {
    return summaryUri;
  }
  const files = buildCollectionFiles(args.entriesByCountry, summary.outcomes, {
    prefix: config.output.prefix,
    generatedAt: args.generatedAt
  });
  for (const file of files) {
    try {
      const stored = await storage.put(file.key, file.yaml, "application/yaml");
      if (stored) {
        logger.info("artifact.collection.written", {
          uri: stored.uri,
          country: file.country,
          mediaType: file.mediaType,
          items: file.ids.length
        });
      }
    } catch (error) {
      logger.warn("artifact.collection.failed", { key: file.key, error: describeError(error) });
    }
  }
  return summaryUri;
}
