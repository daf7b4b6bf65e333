import { z } from "zod";
import { titleKey } from "../engine/normalize.js";
import { SourceError, describeError } from "../errors.js";
import { logger as rootLogger, type ContextLogger } from "../logger.js";
import { withRetry, type RetryConfig } from "../retry.js";
import type { MediaType, SourceEntry } from "../types.js";

export const DEFAULT_TOP10_URL =
  "https://www.netflix.com/tudum/top10/data/all-weeks-countries.tsv";

const rowSchema = z.object({
  country_name: z.string().min(1),
  country_iso2: z.string().default(""),
  week: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  category: z.string().min(1),
  weekly_rank: z.coerce.number().int().positive(),
  show_title: z.string().min(1),
  season_title: z.string().optional()
});

export type TopTenRow = z.infer<typeof rowSchema>;

const categoryToMediaType: Record<string, MediaType> = {
  films: "movie",
  tv: "show"
};

export type TopTenOptions = {
  url: string;
  countries: string[];
  limit: number;
  retry: Pick<RetryConfig, "retries" | "backoffMs">;
  timeoutMs: number;
};

/** Downloads the weekly country file once and resolves entries for every requested country. */
export async function fetchTopTen(
  options: TopTenOptions,
  deps: { fetch?: typeof fetch; logger?: ContextLogger } = {}
): Promise<Map<string, SourceEntry[]>> {
  const fetchImpl = deps.fetch ?? globalThis.fetch;
  const log = deps.logger ?? rootLogger;

  let text: string;
  try {
    text = await withRetry(
      async () => {
        const res = await fetchImpl(options.url, {
          headers: {
            Accept: "text/tab-separated-values",
            "User-Agent": "Mozilla/5.0 (compatible; trending-requester)"
          },
          signal: AbortSignal.timeout(options.timeoutMs)
        });
        if (!res.ok) {
          throw new Error(`HTTP ${res.status}`);
        }
        return res.text();
      },
      {
        ...options.retry,
        onRetry: (error, attempt, waitMs) =>
          log.warn("top10.fetch.retry", { attempt, waitMs, error: describeError(error) })
      }
    );
  } catch (error) {
    throw new SourceError(`Failed to download top 10 list: ${describeError(error)}`, {
      cause: error
    });
  }

  const { rows, skipped } = parseTopTenTsv(text);
  if (skipped > 0) {
    log.warn("top10.parse.skipped", { skipped });
  }

  const byCountry = new Map<string, SourceEntry[]>();
  for (const country of options.countries) {
    const entries = selectTopTen(rows, { country, limit: options.limit });
    if (entries.length === 0) {
      log.warn("top10.country.empty", { country });
    } else {
      log.info("top10.country.loaded", {
        country,
        movies: entries.filter((entry) => entry.mediaType === "movie").length,
        shows: entries.filter((entry) => entry.mediaType === "show").length
      });
    }
    byCountry.set(country, entries);
  }
  return byCountry;
}

export function parseTopTenTsv(text: string): { rows: TopTenRow[]; skipped: number } {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [headerLine, ...dataLines] = lines;
  if (!headerLine) {
    throw new SourceError("Top 10 file is empty.");
  }
  const headers = headerLine.split("\t").map((header) => header.trim());
  for (const required of ["country_name", "week", "category", "weekly_rank", "show_title"]) {
    if (!headers.includes(required)) {
      throw new SourceError(`Top 10 file is missing the "${required}" column.`);
    }
  }

  const rows: TopTenRow[] = [];
  let skipped = 0;
  for (const line of dataLines) {
    const cells = line.split("\t");
    const record = Object.fromEntries(
      headers.map((header, index) => [header, cells[index]?.trim() ?? ""])
    );
    const parsed = rowSchema.safeParse(record);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      skipped += 1;
    }
  }
  return { rows, skipped };
}

/**
 * Latest week for one country (matched by name or ISO2 code), movies first
 * then shows, each in weekly rank order and capped at `limit`.
 */
export function selectTopTen(
  rows: readonly TopTenRow[],
  options: { country: string; limit: number }
): SourceEntry[] {
  const wanted = options.country.trim().toLowerCase();
  const countryRows = rows.filter(
    (row) =>
      row.country_name.toLowerCase() === wanted || row.country_iso2.toLowerCase() === wanted
  );
  if (countryRows.length === 0) return [];

  const latestWeek = countryRows.reduce(
    (latest, row) => (row.week > latest ? row.week : latest),
    countryRows[0].week
  );
  const weekRows = countryRows
    .filter((row) => row.week === latestWeek)
    .sort((a, b) => a.weekly_rank - b.weekly_rank);

  const entries: SourceEntry[] = [];
  for (const mediaType of ["movie", "show"] as const) {
    const seen = new Set<string>();
    for (const row of weekRows) {
      if (categoryToMediaType[row.category.toLowerCase()] !== mediaType) continue;
      const key = titleKey(row.show_title);
      if (seen.has(key)) continue;
      seen.add(key);
      if (seen.size > options.limit) break;
      entries.push({
        title: row.show_title,
        mediaType,
        rank: row.weekly_rank,
        country: options.country
      });
    }
  }
  return entries;
}
