/**
 * Report export task types.
 */

/** Sampling levels accepted by the reporting API. */
export type SamplingLevel = "DEFAULT" | "SMALL" | "LARGE";

/** A normalised request handed to the reporting client. */
export interface ReportRequest {
  viewId: string;
  startDate: string;
  endDate: string;
  samplingLevel?: SamplingLevel;
  dimensions: string[];
  metrics: string[];
  pageSize: number;
  includeEmptyRows: boolean;
}

/** Report selectors and paging options shared by every request of a task. */
export interface ReportQuery {
  dimensions: string[];
  metrics: string[];
  pageSize: number;
  includeEmptyRows: boolean;
  samplingLevel?: SamplingLevel;
}

/** Metadata passed through every ETL pipeline step. */
export interface TaskMetadata {
  viewId: string;
  since: string;
  until: string;
  bucket: string;
  key: string;
}

/** A column name with its storage type hint, e.g. `int(11)`. */
export interface ColumnDef {
  name: string;
  type: string;
}

export interface ColumnHeaders {
  dimensions: ColumnDef[];
  metrics: ColumnDef[];
}

/** One flattened line of the exported file. */
export type OutputRecord = Record<string, string>;

/** Result of the transform step. */
export interface FlattenedReport {
  headers: ColumnHeaders;
  records: OutputRecord[];
}

/** Result returned from ReportExport.run(). */
export interface PipelineResult {
  viewId: string;
  since: string;
  until: string;
  bucket: string;
  key: string;
  recordCount: number;
  columns: ColumnDef[];
}
