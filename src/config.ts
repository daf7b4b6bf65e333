import "dotenv/config";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_TOP10_URL } from "./source/netflix.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  OVERSEERR_URL: z.string().optional(),
  OVERSEERR_API_KEY: z.string().optional(),
  OVERSEERR_IS_4K: z.string().optional(),

  TOP10_URL: z.string().url().optional(),
  TOP10_COUNTRIES: z.string().optional(),
  TOP10_LIMIT: z.coerce.number().int().positive().optional(),

  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DRY_RUN: z.string().optional(),

  RUN_FREQUENCY_HOURS: z.coerce.number().positive().optional(),
  SCHEDULE_HOUR: z.coerce.number().int().min(0).max(23).optional(),
  SCHEDULE_MINUTE: z.coerce.number().int().min(0).max(59).optional(),
  TIMEZONE: z.string().optional(),

  STORAGE_TYPE: z.enum(["local", "s3", "none"]).optional(),
  OUTPUT_PREFIX: z.string().optional(),
  BUCKET_URI: z.string().optional(),
  BUCKET_NAME: z.string().optional(),
  BUCKET_REGION: z.string().optional(),
  BUCKET_ENDPOINT: z.string().optional(),
  BUCKET_FORCE_PATH_STYLE: z.string().optional(),
  BUCKET_ACCESS_KEY_ID: z.string().optional(),
  BUCKET_SECRET_ACCESS_KEY: z.string().optional(),
  COLLECTIONS_ENABLED: z.string().optional(),

  WEBHOOK_URL: z.string().optional(),
  WEBHOOK_SECRET: z.string().optional(),
  SLACK_TOKEN: z.string().optional(),
  SLACK_CHANNEL: z.string().optional(),
  RETRY_COUNT: z.coerce.number().int().nonnegative().optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_INCLUDE_TIMINGS: z.string().optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional()
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
  file: ConfigFile = defaultConfig
) {
  const envResult = envSchema.safeParse(source);
  if (!envResult.success) {
    const issues = envResult.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const env = envResult.data;
  const fileConfig = fileConfigSchema.parse(file);

  const baseUrl = env.OVERSEERR_URL ?? fileConfig.overseerr.url;
  const apiKey = env.OVERSEERR_API_KEY ?? fileConfig.overseerr.apiKey;
  const missing = [
    baseUrl ? null : "OVERSEERR_URL",
    apiKey ? null : "OVERSEERR_API_KEY"
  ].filter((name): name is string => name !== null);
  if (!baseUrl || !apiKey) {
    throw new ConfigError(
      `Missing ${missing.join(" and ")} (env or config.defaults.ts). ` +
        "Example: OVERSEERR_URL=http://localhost:5055 OVERSEERR_API_KEY=<key>"
    );
  }

  const overseerrUrl = withScheme(baseUrl);
  if (!z.string().url().safeParse(overseerrUrl).success) {
    throw new ConfigError(
      `Invalid OVERSEERR_URL "${baseUrl}". Example: OVERSEERR_URL=http://localhost:5055`
    );
  }

  const storageType = env.STORAGE_TYPE ?? fileConfig.storage.type;
  const storage = {
    type: storageType,
    bucket: resolveBucketName(env, fileConfig.storage.bucket),
    region: env.BUCKET_REGION ?? fileConfig.storage.region,
    endpoint: env.BUCKET_ENDPOINT ?? fileConfig.storage.endpoint,
    forcePathStyle: resolveBool(
      env.BUCKET_FORCE_PATH_STYLE,
      fileConfig.storage.forcePathStyle
    ),
    accessKeyId: env.BUCKET_ACCESS_KEY_ID ?? fileConfig.storage.accessKeyId,
    secretAccessKey:
      env.BUCKET_SECRET_ACCESS_KEY ?? fileConfig.storage.secretAccessKey
  };

  if (storage.type === "s3" && !storage.bucket) {
    throw new ConfigError("Missing BUCKET_NAME/BUCKET_URI for S3 storage.");
  }

  const frequencyHours = env.RUN_FREQUENCY_HOURS ?? fileConfig.schedule.frequencyHours;

  return {
    overseerr: {
      baseUrl: overseerrUrl,
      apiKey,
      is4k: resolveBool(env.OVERSEERR_IS_4K, fileConfig.overseerr.is4k)
    },
    top10: {
      url: env.TOP10_URL ?? fileConfig.top10.url,
      countries: resolveList(env.TOP10_COUNTRIES, fileConfig.top10.countries),
      limit: env.TOP10_LIMIT ?? fileConfig.top10.limit
    },
    requests: {
      delayMs: env.REQUEST_DELAY_MS ?? fileConfig.requests.delayMs,
      timeoutMs: env.REQUEST_TIMEOUT_MS ?? fileConfig.requests.timeoutMs,
      dryRun: resolveBool(env.DRY_RUN, fileConfig.requests.dryRun)
    },
    schedule: frequencyHours
      ? { type: "interval" as const, hours: frequencyHours }
      : {
          type: "daily" as const,
          hour: env.SCHEDULE_HOUR ?? fileConfig.schedule.hour,
          minute: env.SCHEDULE_MINUTE ?? fileConfig.schedule.minute
        },
    timeZone: env.TIMEZONE ?? fileConfig.timeZone,
    output: {
      prefix: env.OUTPUT_PREFIX ?? fileConfig.output.prefix,
      collections: resolveBool(env.COLLECTIONS_ENABLED, fileConfig.output.collections)
    },
    storage,
    webhook: {
      url: env.WEBHOOK_URL ?? fileConfig.webhook.url,
      secret: env.WEBHOOK_SECRET ?? fileConfig.webhook.secret,
      token: env.SLACK_TOKEN ?? fileConfig.webhook.token,
      channel: env.SLACK_CHANNEL ?? fileConfig.webhook.channel
    },
    network: {
      retryCount: env.RETRY_COUNT ?? fileConfig.network.retryCount,
      retryBackoffMs: env.RETRY_BACKOFF_MS ?? fileConfig.network.retryBackoffMs
    },
    logging: {
      level: env.LOG_LEVEL ?? fileConfig.logging.level,
      includeTimings: resolveBool(
        env.LOG_INCLUDE_TIMINGS,
        fileConfig.logging.includeTimings
      ),
      format: env.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(env.LOG_COLOR, fileConfig.logging.color),
      timeZone: env.TIMEZONE ?? fileConfig.timeZone
    }
  };
}

export const fileConfigSchema = z.object({
  overseerr: z
    .object({
      url: z.string().optional(),
      apiKey: z.string().optional(),
      is4k: z.boolean().default(false)
    })
    .default({}),
  top10: z
    .object({
      url: z.string().url().default(DEFAULT_TOP10_URL),
      countries: z.array(z.string().min(1)).default(["United States"]),
      limit: z.coerce.number().int().positive().default(10)
    })
    .default({}),
  requests: z
    .object({
      delayMs: z.coerce.number().int().nonnegative().default(1000),
      timeoutMs: z.coerce.number().int().positive().default(30000),
      dryRun: z.boolean().default(false)
    })
    .default({}),
  schedule: z
    .object({
      frequencyHours: z.coerce.number().positive().optional(),
      hour: z.coerce.number().int().min(0).max(23).default(2),
      minute: z.coerce.number().int().min(0).max(59).default(0)
    })
    .default({}),
  timeZone: z.string().optional(),
  output: z
    .object({
      prefix: z.string().default("trending"),
      collections: z.boolean().default(true)
    })
    .default({}),
  storage: z
    .object({
      type: z.enum(["local", "s3", "none"]).default("local"),
      bucket: z.string().optional(),
      region: z.string().optional(),
      endpoint: z.string().optional(),
      forcePathStyle: z.boolean().default(false),
      accessKeyId: z.string().optional(),
      secretAccessKey: z.string().optional()
    })
    .default({}),
  network: z
    .object({
      retryCount: z.coerce.number().int().nonnegative().default(3),
      retryBackoffMs: z.coerce.number().int().positive().default(1000)
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      includeTimings: z.boolean().default(false),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false)
    })
    .default({}),
  webhook: z
    .object({
      url: z.string().optional(),
      secret: z.string().optional(),
      token: z.string().optional(),
      channel: z.string().optional()
    })
    .default({})
});

export type ConfigFile = z.input<typeof fileConfigSchema>;

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}

function resolveList(value: string | undefined, fallback: string[]) {
  if (!value) return fallback;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function resolveBucketName(
  env: { BUCKET_NAME?: string; BUCKET_URI?: string },
  fallback?: string
) {
  if (env.BUCKET_NAME) return env.BUCKET_NAME;
  if (env.BUCKET_URI) return stripBucketScheme(env.BUCKET_URI);
  return fallback;
}

// Bare host:port values get http://, as buildApiUrl does.
function withScheme(value: string) {
  const trimmed = value.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

function stripBucketScheme(value: string) {
  return value.replace(/^s3:\/\//, "");
}
