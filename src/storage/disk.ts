/**
 * Local filesystem storage backend. Buckets are directories under `basePath`.
 */
import { copyFile, mkdir, readFile, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(bucket: string, key: string): string {
    return join(this.basePath, bucket, key);
  }

  async upload(bucket: string, key: string, filePath: string): Promise<void> {
    const fullPath = this.resolve(bucket, key);
    await mkdir(dirname(fullPath), { recursive: true });
    await copyFile(filePath, fullPath);
  }

  async read(bucket: string, key: string): Promise<Uint8Array> {
    const buf = await readFile(this.resolve(bucket, key));
    return new Uint8Array(buf);
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      const s = await stat(this.resolve(bucket, key));
      return s.isFile();
    } catch {
      return false;
    }
  }
}
