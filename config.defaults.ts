import type { ConfigFile } from "./src/config.js";
import { DEFAULT_TOP10_URL } from "./src/source/netflix.js";

export const defaultConfig: ConfigFile = {
  overseerr: {
    // url and apiKey normally come from OVERSEERR_URL / OVERSEERR_API_KEY
    is4k: false, // Submit 4K requests instead of standard ones
  },
  top10: {
    url: DEFAULT_TOP10_URL, // Weekly per-country top 10 file
    countries: ["United States"], // Country names or ISO2 codes as they appear in the file
    limit: 10, // Entries per media type and country
  },
  requests: {
    delayMs: 1000, // Pause between entries to stay gentle on the request service
    timeoutMs: 30000, // Per-call timeout for request service calls
    dryRun: false, // Resolve and report without submitting requests
  },
  schedule: {
    hour: 2, // Daily run time (hour, 0-23) when no frequency is set
    minute: 0, // Daily run time (minute)
  },
  output: {
    prefix: "trending", // Storage path prefix for run summaries and collection files
    collections: true, // Write Kometa collection files after each run
  },
  storage: {
    type: "local", // "local" (./out), "s3", or "none"
  },
  network: {
    retryCount: 3, // Retries for 5xx and network failures
    retryBackoffMs: 1000, // Base backoff, doubled on each retry
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    includeTimings: true, // Include execution time in log entries
    format: "pretty", // Log format: "pretty" (human-readable) or "json"
    color: true, // Enable colored output in terminal logs
  },
  webhook: {}, // Run summary notification settings
};
