import { stringify } from "yaml";
import { titleKey } from "../engine/normalize.js";
import type { MediaType, RequestOutcome, SourceEntry } from "../types.js";

export type CollectionFile = {
  key: string;
  country: string;
  mediaType: MediaType;
  name: string;
  ids: number[];
  yaml: string;
};

const labels: Record<MediaType, { plural: string; builder: "tmdb_movie" | "tmdb_show" }> = {
  movie: { plural: "Movies", builder: "tmdb_movie" },
  show: { plural: "Shows", builder: "tmdb_show" }
};

/**
 * Kometa collection definitions, one file per country and media type. Ids
 * keep the list's rank order; titles that never resolved to a catalog entry
 * are left out, and a list with no resolved titles produces no file.
 */
export function buildCollectionFiles(
  entriesByCountry: ReadonlyMap<string, readonly SourceEntry[]>,
  outcomes: readonly RequestOutcome[],
  options: { prefix: string; generatedAt: Date }
): CollectionFile[] {
  const resolved = new Map<string, number>();
  for (const item of outcomes) {
    if (item.catalogId === undefined) continue;
    const key = lookupKey(item.sourceEntry);
    if (!resolved.has(key)) resolved.set(key, item.catalogId);
  }

  const files: CollectionFile[] = [];
  for (const [country, entries] of entriesByCountry) {
    for (const mediaType of ["movie", "show"] as const) {
      const ids: number[] = [];
      for (const entry of entries) {
        if (entry.mediaType !== mediaType) continue;
        const id = resolved.get(lookupKey(entry));
        if (id !== undefined && !ids.includes(id)) ids.push(id);
      }
      if (ids.length === 0) continue;

      const { plural, builder } = labels[mediaType];
      const name = `Netflix Top 10 ${plural} (${country})`;
      const document = {
        collections: {
          [name]: {
            summary: `Netflix weekly top 10 ${plural.toLowerCase()} in ${country}.`,
            [builder]: ids,
            collection_order: "custom",
            sync_mode: "sync"
          }
        }
      };
      const header = `# Generated ${options.generatedAt.toISOString()}\n`;
      files.push({
        key: `${options.prefix}/collections/netflix-top10-${slugify(country)}-${plural.toLowerCase()}.yml`,
        country,
        mediaType,
        name,
        ids,
        yaml: header + stringify(document)
      });
    }
  }
  return files;
}

function lookupKey(entry: SourceEntry) {
  return `${entry.mediaType}:${titleKey(entry.title)}`;
}

export function slugify(value: string) {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
