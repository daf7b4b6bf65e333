#!/usr/bin/env node
import { Command } from "commander";
import { z } from "zod";
import type { CatalogClient } from "./catalog/client.js";
import { createOverseerrClient } from "./catalog/overseerr.js";
import { loadConfig, type AppConfig } from "./config.js";
import { formatSummaryLine } from "./engine/aggregator.js";
import { CatalogAuthError, describeError } from "./errors.js";
import { logger, setLoggerConfig } from "./logger.js";
import type { RunReport } from "./report/summary.js";
import { runOnce } from "./runner/run-once.js";
import { runForever } from "./scheduler.js";
import { fetchTopTen } from "./source/netflix.js";
import {
  createStorageClient,
  describeStorage,
  validateStorage,
  type StorageClient
} from "./storage.js";

type BaseContext = {
  config: AppConfig;
  catalog: CatalogClient;
  storage: StorageClient;
};

const runOptionsSchema = z.object({
  dryRun: z.boolean().optional(),
  country: z.array(z.string().min(1)).optional(),
  limit: z.coerce.number().int().positive().optional(),
  writeArtifacts: z.boolean().optional(),
  notify: z.boolean().default(true),
  json: z.boolean().optional()
});

const serveOptionsSchema = z.object({
  frequency: z.coerce.number().positive().optional(),
  dryRun: z.boolean().optional(),
  notify: z.boolean().default(true)
});

const top10OptionsSchema = z.object({
  country: z.array(z.string().min(1)).optional(),
  limit: z.coerce.number().int().positive().optional(),
  json: z.boolean().optional()
});

const program = new Command();
program
  .name("trending-requester")
  .description("Request Netflix top 10 titles in Overseerr")
  .version("0.1.0");

program
  .command("run")
  .description("Run one pass over the current top 10")
  .option("--dry-run", "Resolve and report without submitting requests")
  .option("--country <country...>", "Country names or ISO2 codes")
  .option("--limit <n>", "Entries per media type and country")
  .option("--write-artifacts", "Write summary and collection files even in a dry run")
  .option("--no-notify", "Skip the webhook/Slack notification")
  .option("--json", "JSON output")
  .action(async (raw: unknown) => {
    const options = runOptionsSchema.parse(raw);
    const { config, catalog, storage } = await loadBase();
    const dryRun = options.dryRun ?? config.requests.dryRun;

    const { summary, report } = await runOnce(
      { config, catalog, storage },
      {
        dryRun,
        writeArtifacts: Boolean(options.writeArtifacts) || !dryRun,
        notify: options.notify,
        countries: options.country,
        limit: options.limit
      }
    );

    printRunReport(report, formatSummaryLine(summary), Boolean(options.json));
    if (summary.fatalError) {
      process.exitCode = 1;
    }
  });

program
  .command("serve")
  .description("Run on a schedule until stopped")
  .option("--frequency <hours>", "Run every N hours instead of daily")
  .option("--dry-run", "Resolve and report without submitting requests")
  .option("--no-notify", "Skip the webhook/Slack notification")
  .action(async (raw: unknown) => {
    const options = serveOptionsSchema.parse(raw);
    const { config, catalog, storage } = await loadBase();
    await checkConnection(catalog);

    const dryRun = options.dryRun ?? config.requests.dryRun;
    const schedule = options.frequency
      ? { type: "interval" as const, hours: options.frequency }
      : config.schedule;
    logger.info("schedule.start", { schedule, timeZone: config.timeZone ?? "UTC" });

    await runForever({
      schedule,
      timeZone: config.timeZone,
      isFatal: (error) => error instanceof CatalogAuthError,
      task: async () => {
        const { summary } = await runOnce(
          { config, catalog, storage },
          { dryRun, writeArtifacts: !dryRun, notify: options.notify }
        );
        if (summary.fatalError) {
          throw new CatalogAuthError(summary.fatalError.message);
        }
      }
    });
  });

program
  .command("check")
  .description("Test the Overseerr connection and API key")
  .action(async () => {
    const { catalog, config } = await loadBase();
    const me = await checkConnection(catalog);
    console.log(
      `connected to ${config.overseerr.baseUrl} as ${me.displayName ?? `user ${me.userId ?? "?"}`}`
    );
  });

program
  .command("top10")
  .description("Print the resolved top 10 entries without touching Overseerr")
  .option("--country <country...>", "Country names or ISO2 codes")
  .option("--limit <n>", "Entries per media type and country")
  .option("--json", "JSON output")
  .action(async (raw: unknown) => {
    const options = top10OptionsSchema.parse(raw);
    const { config } = await loadBase();
    const byCountry = await fetchTopTen({
      url: config.top10.url,
      countries: options.country ?? config.top10.countries,
      limit: options.limit ?? config.top10.limit,
      timeoutMs: config.requests.timeoutMs,
      retry: { retries: config.network.retryCount, backoffMs: config.network.retryBackoffMs }
    });
    const rows = [...byCountry.values()].flat();
    printJsonOrTable(rows, ["country", "mediaType", "rank", "title"], Boolean(options.json));
  });

program.parseAsync(process.argv).catch((error) => {
  console.error(describeError(error));
  process.exitCode = 1;
});

async function loadBase(): Promise<BaseContext> {
  const config = loadConfig();
  setLoggerConfig({
    level: config.logging.level,
    includeTimings: config.logging.includeTimings,
    format: config.logging.format,
    color: config.logging.color,
    timeZone: config.logging.timeZone
  });
  const catalog = createOverseerrClient({
    baseUrl: config.overseerr.baseUrl,
    apiKey: config.overseerr.apiKey,
    is4k: config.overseerr.is4k,
    timeoutMs: config.requests.timeoutMs,
    retryCount: config.network.retryCount,
    retryBackoffMs: config.network.retryBackoffMs
  });
  const storage = createStorageClient(config.storage);
  logger.debug("storage.validate.start", describeStorage(config.storage));
  await validateStorage(config.storage);
  return { config, catalog, storage };
}

async function checkConnection(catalog: CatalogClient) {
  try {
    const me = await catalog.testConnection();
    logger.info("catalog.connected", { userId: me.userId ?? null, displayName: me.displayName ?? null });
    return me;
  } catch (error) {
    logger.error(error instanceof CatalogAuthError ? "run.fatal" : "catalog.unreachable", {
      error: describeError(error)
    });
    throw error;
  }
}

function printRunReport(report: RunReport, summaryLine: string, json: boolean) {
  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  const rows = report.outcomes.map((item) => ({
    rank: item.rank,
    type: item.mediaType,
    title: item.title,
    outcome: item.outcome,
    id: item.catalogId ?? "",
    season: item.seasonNumber ?? "",
    detail: item.detail
  }));
  printJsonOrTable(rows, ["rank", "type", "title", "outcome", "id", "season", "detail"], false);
  console.log(`\n${summaryLine}`);
}

function printJsonOrTable<T extends Record<string, unknown>>(rows: T[], headers: string[], json: boolean) {
  if (json) {
    console.log(JSON.stringify(rows, null, 2));
    return;
  }
  if (rows.length === 0) {
    console.log("No results.");
    return;
  }
  console.log(buildTable(headers, rows));
}

function buildTable(headers: string[], rows: Record<string, unknown>[]) {
  const widths = headers.map((header) => header.length);
  for (const row of rows) {
    headers.forEach((header, index) => {
      const value = String(row[header] ?? "");
      widths[index] = Math.max(widths[index], value.length);
    });
  }
  const headerLine = headers.map((header, index) => header.padEnd(widths[index])).join("  ");
  const separator = headers.map((_, index) => "-".repeat(widths[index])).join("  ");
  const body = rows.map((row) =>
    headers
      .map((header, index) => String(row[header] ?? "").padEnd(widths[index]))
      .join("  ")
  );
  return [headerLine, separator, ...body].join("\n");
}
