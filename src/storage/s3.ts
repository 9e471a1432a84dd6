/**
 * S3-compatible storage backend using the AWS SDK.
 *
 * Works with AWS S3 and GCS (via GCS's S3-compatible XML API with HMAC keys).
 */
import {
  GetObjectCommand,
  HeadObjectCommand,
  NotFound,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import { readFile } from "node:fs/promises";
import type { StorageBackend } from "./backend.js";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export interface S3StorageConfig {
  endpoint?: string;
  accessKeyId: string;
  secretAccessKey: string;
  region?: string;
  prefix?: string;
}

/** Path-style addressing whenever a custom endpoint (e.g. GCS) is set. */
export function buildS3ClientConfig(config: S3StorageConfig): S3ClientConfig {
  return {
    endpoint: config.endpoint,
    region: config.region ?? "auto",
    forcePathStyle: Boolean(config.endpoint),
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  };
}

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private prefix: string;

  constructor(config: S3StorageConfig) {
    this.client = new S3Client(buildS3ClientConfig(config));
    this.prefix = config.prefix ? config.prefix.replace(/\/$/, "") + "/" : "";
  }

  private fullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async upload(bucket: string, key: string, filePath: string): Promise<void> {
    const body = await readFile(filePath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: this.fullKey(key),
        Body: body,
        ContentType: NDJSON_CONTENT_TYPE,
      }),
    );
  }

  async read(bucket: string, key: string): Promise<Uint8Array> {
    const res = await this.client.send(
      new GetObjectCommand({ Bucket: bucket, Key: this.fullKey(key) }),
    );
    if (!res.Body) {
      throw new Error(`Empty response body for s3://${bucket}/${this.fullKey(key)}`);
    }
    return res.Body.transformToByteArray();
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: this.fullKey(key) }),
      );
      return true;
    } catch (err) {
      if (err instanceof NotFound) return false;
      throw err;
    }
  }
}
