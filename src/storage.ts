import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { HeadBucketCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";

export type StorageConfig = {
  type: "local" | "s3" | "none";
  bucket?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
};

export type StoredArtifact = {
  key: string;
  uri: string;
  size: number;
};

/** Write-only sink for run artifacts; nothing written here is read back by a run. */
export type StorageClient = {
  put: (key: string, body: string, contentType?: string) => Promise<StoredArtifact | null>;
};

export function describeStorage(config: StorageConfig) {
  return {
    type: config.type,
    bucket: config.bucket ?? null,
    region: config.region ?? null,
    endpoint: config.endpoint ?? null,
    forcePathStyle: config.forcePathStyle ?? false
  };
}

export function createStorageClient(
  config: StorageConfig,
  options: { baseDir?: string } = {}
): StorageClient {
  if (config.type === "none") {
    return { put: async () => null };
  }
  if (config.type === "local") {
    return createLocalClient(options.baseDir ?? join(process.cwd(), "out"));
  }
  return createS3Client(config);
}

export async function validateStorage(config: StorageConfig, options: { baseDir?: string } = {}) {
  if (config.type === "none") return;
  if (config.type === "local") {
    await mkdir(options.baseDir ?? join(process.cwd(), "out"), { recursive: true });
    return;
  }
  if (!config.bucket) {
    throw new Error("Storage validation failed: missing bucket name.");
  }
  try {
    await buildS3(config).send(new HeadBucketCommand({ Bucket: config.bucket }));
  } catch (error) {
    const status = httpStatusOf(error);
    const hint =
      status === 403
        ? "Check access keys and bucket permissions."
        : status === 404
        ? "Bucket not found; check bucket name and endpoint."
        : "Check endpoint and credentials.";
    throw new Error(`Storage validation failed (${status ?? "unknown"}): ${hint}`, {
      cause: error
    });
  }
}

function createLocalClient(basePath: string): StorageClient {
  return {
    async put(key, body) {
      const filePath = join(basePath, key);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, body, "utf8");
      return {
        key,
        uri: filePath,
        size: Buffer.byteLength(body, "utf8")
      };
    }
  };
}

function createS3Client(config: StorageConfig): StorageClient {
  const bucket = config.bucket;
  if (!bucket) {
    throw new Error("Missing storage.bucket for S3.");
  }
  const client = buildS3(config);

  return {
    async put(key, body, contentType) {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType ?? "text/plain; charset=utf-8"
        })
      );
      return {
        key,
        uri: `s3://${bucket}/${key}`,
        size: Buffer.byteLength(body, "utf8")
      };
    }
  };
}

function buildS3(config: StorageConfig) {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: config.accessKeyId
      ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey ?? ""
        }
      : undefined
  });
}

function httpStatusOf(error: unknown) {
  if (typeof error !== "object" || error === null || !("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}
