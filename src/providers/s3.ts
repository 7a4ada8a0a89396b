import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import type { GetObjectOptions, ObjectStore, RemoteObject } from "./types.js";
import { ContentTooLargeError, NetworkError, SyncError } from "../core/errors.js";
import { normalizeFolder } from "../core/registry.js";

/**
 * S3 store configuration
 */
export type S3StoreConfig = {
  /** S3 bucket name */
  bucket: string;
  /** Key prefix inside the bucket (default: none) */
  prefix?: string;
  /** AWS region for the bucket (e.g. "eu-central-1") */
  region?: string;
  /** Custom endpoint for S3-compatible stores */
  endpoint?: string;
  forcePathStyle?: boolean;
  /** Optional S3 client (for testing or custom config) */
  client?: S3Client;
};

export interface ParsedS3Remote {
  bucket: string;
  prefix: string;
}

/**
 * Parse an S3 remote string.
 * Format: s3:bucket[/prefix]
 *   s3:fares → { bucket: "fares", prefix: "" }
 *   s3:fares/json/v2 → { bucket: "fares", prefix: "json/v2" }
 */
export function parseS3Remote(remote: string): ParsedS3Remote | null {
  if (!remote.startsWith("s3:")) return null;

  const [bucket, ...rest] = remote.slice("s3:".length).split("/");
  if (!bucket) return null;

  return { bucket, prefix: normalizeFolder(rest.join("/")) };
}

type AwsError = Error & { $metadata?: { httpStatusCode?: number } };

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3StoreConfig) {
    this.client = config.client ?? new S3Client(clientConfig(config));
    this.bucket = config.bucket;
    this.prefix = normalizeFolder(config.prefix ?? "");
  }

  private toS3Key(key: string): string {
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  private fromS3Key(s3Key: string): string {
    return this.prefix && s3Key.startsWith(`${this.prefix}/`)
      ? s3Key.slice(this.prefix.length + 1)
      : s3Key;
  }

  async listObjects(folder: string): Promise<RemoteObject[]> {
    const normalized = normalizeFolder(folder);
    const folderKey = normalized ? this.toS3Key(normalized) : this.prefix;
    const listPrefix = folderKey ? `${folderKey}/` : "";
    const objects: RemoteObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const result = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: listPrefix,
            Delimiter: "/",
            ContinuationToken: continuationToken,
          }),
        );

        for (const item of result.Contents ?? []) {
          if (!item.Key || !item.ETag) continue;
          objects.push({ key: this.fromS3Key(item.Key), tag: item.ETag });
        }

        continuationToken = result.IsTruncated
          ? result.NextContinuationToken
          : undefined;
      } while (continuationToken);
    } catch (err) {
      throw toNetworkError(`list ${listPrefix || "/"}`, err as AwsError);
    }

    return objects;
  }

  async headObject(key: string): Promise<string | null> {
    try {
      const result = await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.toS3Key(key),
        }),
      );
      return result.ETag ?? null;
    } catch (err) {
      const error = err as AwsError;
      if (error.name === "NotFound" || error.$metadata?.httpStatusCode === 404) {
        return null;
      }
      throw toNetworkError(`head ${key}`, error);
    }
  }

  async getObject(
    key: string,
    options: GetObjectOptions = {},
  ): Promise<AsyncIterable<Uint8Array>> {
    try {
      const result = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: this.toS3Key(key),
        }),
      );
      if (!result.Body) {
        throw new NetworkError(`Empty response body for ${key}`);
      }
      const stream = result.Body.transformToWebStream();
      const { maxBytes } = options;
      if (
        maxBytes !== undefined &&
        result.ContentLength !== undefined &&
        result.ContentLength > maxBytes
      ) {
        await stream.cancel();
        throw new ContentTooLargeError(key, maxBytes);
      }
      return readStream(stream);
    } catch (err) {
      if (err instanceof SyncError) throw err;
      throw toNetworkError(`get ${key}`, err as AwsError);
    }
  }

  describe(): string {
    return this.prefix ? `s3:${this.bucket}/${this.prefix}` : `s3:${this.bucket}`;
  }
}

function clientConfig(config: S3StoreConfig): S3ClientConfig {
  const result: S3ClientConfig = {};
  if (config.region) result.region = config.region;
  if (config.endpoint) result.endpoint = config.endpoint;
  if (config.forcePathStyle !== undefined) result.forcePathStyle = config.forcePathStyle;
  return result;
}

function toNetworkError(what: string, error: AwsError): NetworkError {
  const status = error.$metadata?.httpStatusCode;
  if (status === 401 || status === 403) {
    return new NetworkError(`Access denied: ${error.message}`, error, false);
  }
  if (error.name === "NoSuchKey" || status === 404) {
    return new NetworkError(`Failed to ${what}: not found`, error, false);
  }
  return new NetworkError(`Failed to ${what}: ${error.message}`, error);
}

/** Yield the chunks of a web stream, cancelling it if the consumer stops early. */
async function* readStream(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let done = false;
  try {
    while (true) {
      const next = await reader.read();
      if (next.done) {
        done = true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!done) await reader.cancel();
    reader.releaseLock();
  }
}
