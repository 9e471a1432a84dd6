/**
 * ETL pipeline core – strategy interfaces and the async ETLPipeline runner.
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Report } from "../analytics/schemas.js";
import type { StorageBackend } from "../storage/backend.js";
import type { FlattenedReport, OutputRecord, TaskMetadata } from "./types.js";
import {
  ExtractionFailedException,
  TransformFailedException,
  UploadFailedException,
} from "./exceptions.js";

// ---------------------------------------------------------------------------
// Strategy interfaces
// ---------------------------------------------------------------------------

/** Fetches the complete report for the task's view and date range. */
export interface ExtractionStrategy {
  extract(task: TaskMetadata): Promise<Report>;
}

/** Turns the columnar report into flat output records. */
export interface TransformStrategy {
  transform(task: TaskMetadata, report: Report): Promise<FlattenedReport>;
}

/** Persists the output records at the task's destination. */
export interface UploadStrategy {
  upload(
    task: TaskMetadata,
    records: OutputRecord[],
    storage: StorageBackend,
  ): Promise<number>;
}

// ---------------------------------------------------------------------------
// Upload strategy – newline-delimited JSON through a temp file
// ---------------------------------------------------------------------------

export function toNdjson(records: OutputRecord[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join("");
}

export class NdjsonUploadStrategy implements UploadStrategy {
  private tmpRoot: string;

  /** @param tmpRoot directory the staging directory is created in */
  constructor(tmpRoot: string = tmpdir()) {
    this.tmpRoot = tmpRoot;
  }

  async upload(
    task: TaskMetadata,
    records: OutputRecord[],
    storage: StorageBackend,
  ): Promise<number> {
    const stagingDir = await mkdtemp(join(this.tmpRoot, "report-export-"));
    try {
      const filePath = join(stagingDir, "report.ndjson");
      await writeFile(filePath, toNdjson(records), "utf8");
      await storage.upload(task.bucket, task.key, filePath);
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
    return records.length;
  }
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export class ETLPipeline {
  private extraction: ExtractionStrategy;
  private transformStrategy: TransformStrategy;
  private uploadStrategy: UploadStrategy;
  private storage: StorageBackend;

  constructor(opts: {
    extraction: ExtractionStrategy;
    transform: TransformStrategy;
    upload?: UploadStrategy;
    storage: StorageBackend;
  }) {
    this.extraction = opts.extraction;
    this.transformStrategy = opts.transform;
    this.uploadStrategy = opts.upload ?? new NdjsonUploadStrategy();
    this.storage = opts.storage;
  }

  /** Step 1: Fetch the report from the reporting API. */
  async extract(task: TaskMetadata): Promise<Report> {
    try {
      return await this.extraction.extract(task);
    } catch (err) {
      throw new ExtractionFailedException(task, err);
    }
  }

  /** Step 2: Flatten the report into output records. */
  async transform(task: TaskMetadata, report: Report): Promise<FlattenedReport> {
    try {
      return await this.transformStrategy.transform(task, report);
    } catch (err) {
      throw new TransformFailedException(task, err);
    }
  }

  /** Step 3: Upload the records to the object store. */
  async upload(task: TaskMetadata, records: OutputRecord[]): Promise<number> {
    try {
      return await this.uploadStrategy.upload(task, records, this.storage);
    } catch (err) {
      throw new UploadFailedException(task, err);
    }
  }

  /** Run the full extract → transform → upload pipeline. */
  async run(task: TaskMetadata): Promise<FlattenedReport> {
    const report = await this.extract(task);
    const flattened = await this.transform(task, report);
    await this.upload(task, flattened.records);
    return flattened;
  }
}
