/**
 * analytics-report-export – pulls a reporting API report for one view and
 * date range and stores it as newline-delimited JSON in an object store.
 */
import type { ReportingClient } from "./analytics/client.js";
import {
  ReportExtractionStrategy,
  ReportFlattenTransformStrategy,
  outputColumns,
} from "./analytics/report.js";
import { parseConfig, parseTaskParams, type TaskParams } from "./config.js";
import { ETLPipeline, NdjsonUploadStrategy, type UploadStrategy } from "./core/etl.js";
import type { PipelineResult, TaskMetadata } from "./core/types.js";
import { createLogger } from "./logger.js";
import type { StorageBackend } from "./storage/backend.js";

export { GoogleAnalyticsReportingClient, type ReportingClient } from "./analytics/client.js";
export {
  METRIC_TYPE_MAP,
  buildColumnHeaders,
  flattenReport,
  metricTypeHint,
  normalizeDate,
  stripNamespace,
} from "./analytics/report.js";
export type { Report } from "./analytics/schemas.js";
export { parseConfig, parseTaskParams, type TaskParams, type TaskParamsInput } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type { StorageBackend } from "./storage/backend.js";
export { DiskStorage } from "./storage/disk.js";
export { S3Storage } from "./storage/s3.js";

const logger = createLogger("report-export");

export class ReportExport {
  private client: ReportingClient;
  private storage: StorageBackend;
  private params: TaskParams;
  private uploadStrategy: UploadStrategy;

  /** Throws ConfigurationError for invalid parameters, before any request is made. */
  constructor(
    client: ReportingClient,
    storage: StorageBackend,
    params: unknown,
    upload: UploadStrategy = new NdjsonUploadStrategy(),
  ) {
    this.client = client;
    this.storage = storage;
    this.params = parseTaskParams(params);
    this.uploadStrategy = upload;
  }

  /** Construct from a configuration dict (validates with Zod). */
  static fromConfig(config: unknown): ReportExport {
    const { client, storage, task } = parseConfig(config);
    return new ReportExport(client, storage, task);
  }

  get task(): TaskMetadata {
    return {
      viewId: this.params.viewId,
      since: this.params.since,
      until: this.params.until,
      bucket: this.params.bucket,
      key: this.params.key,
    };
  }

  async run(): Promise<PipelineResult> {
    const task = this.task;
    const pipeline = new ETLPipeline({
      extraction: new ReportExtractionStrategy(this.client, {
        dimensions: this.params.dimensions,
        metrics: this.params.metrics,
        pageSize: this.params.pageSize,
        includeEmptyRows: this.params.includeEmptyRows,
        samplingLevel: this.params.samplingLevel,
      }),
      transform: new ReportFlattenTransformStrategy(),
      upload: this.uploadStrategy,
      storage: this.storage,
    });

    logger.info({ ...task }, "Starting report export");
    const { headers, records } = await pipeline.run(task);
    logger.info(
      { viewId: task.viewId, bucket: task.bucket, key: task.key, records: records.length },
      "Report export completed",
    );

    return {
      ...task,
      recordCount: records.length,
      columns: outputColumns(headers),
    };
  }
}
