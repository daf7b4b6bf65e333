const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  middot: "·"
};

function fromCodePoint(cp: number): string | null {
  if (!Number.isInteger(cp) || cp < 0 || cp > 0x10ffff) return null;
  if (cp >= 0xd800 && cp <= 0xdfff) return null;
  return String.fromCodePoint(cp);
}

/** Numeric entities plus a short allowlist of named ones; anything else is left as-is. */
export function decodeHtmlEntities(input: string) {
  if (!input) return "";
  return input
    .replace(/&#x([0-9a-fA-F]{1,6});/g, (match, hex: string) =>
      fromCodePoint(Number.parseInt(hex, 16)) ?? match
    )
    .replace(/&#([0-9]{1,7});/g, (match, dec: string) =>
      fromCodePoint(Number.parseInt(dec, 10)) ?? match
    )
    .replace(/&([a-zA-Z]{2,8});/g, (match, name: string) =>
      NAMED_ENTITIES[name.toLowerCase()] ?? match
    );
}

/**
 * Display form used for catalog search queries: entities decoded, NFKC,
 * invisible marks removed, whitespace collapsed, typographic quotes and
 * dashes folded to ASCII.
 */
export function normalizeTitle(raw: string) {
  return decodeHtmlEntities(raw)
    .normalize("NFKC")
    .replace(/[\u200b-\u200f\u202a-\u202e\ufeff]/g, "")
    .replace(/[\u2018\u2019\u02bc]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/[\u2013\u2014]/g, "-")
    .replace(/\s+/g, " ")
    .trim();
}

/** Comparison key: case-insensitive and whitespace-collapsed. */
export function titleKey(raw: string) {
  return normalizeTitle(raw).toLowerCase();
}
