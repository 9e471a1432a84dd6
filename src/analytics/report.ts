/**
 * Report extraction and flatten strategies.
 */
import { format, isValid, parse } from "date-fns";

import type { ExtractionStrategy, TransformStrategy } from "../core/etl.js";
import { RowAlignmentError } from "../core/exceptions.js";
import type {
  ColumnDef,
  ColumnHeaders,
  FlattenedReport,
  OutputRecord,
  ReportQuery,
  TaskMetadata,
} from "../core/types.js";
import { createLogger } from "../logger.js";
import type { ReportingClient } from "./client.js";
import type { ColumnHeader, Report } from "./schemas.js";

const logger = createLogger("report");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Type hint used for dimensions and for metrics of unknown type. */
export const STRING_TYPE_HINT = "varchar(255)";

export const METRIC_TYPE_MAP: Readonly<Record<string, string>> = Object.freeze({
  METRIC_TYPE_UNSPECIFIED: STRING_TYPE_HINT,
  CURRENCY: "decimal(20,5)",
  INTEGER: "int(11)",
  FLOAT: "decimal(20,5)",
  PERCENT: "decimal(20,5)",
  TIME: "time",
});

export function metricTypeHint(type: string): string {
  return Object.hasOwn(METRIC_TYPE_MAP, type) ? METRIC_TYPE_MAP[type] : STRING_TYPE_HINT;
}

const DATE_TIME_PATTERN = /^\d{4}-\d{1,2}-\d{1,2} \d{1,2}:\d{1,2}:\d{1,2}$/;

/**
 * Reduce a `YYYY-MM-DD HH:MM:SS` timestamp to `YYYY-MM-DD`. Anything else is
 * returned unchanged.
 */
export function normalizeDate(value: string): string {
  if (!DATE_TIME_PATTERN.test(value)) return value;
  const parsed = parse(value, "yyyy-MM-dd HH:mm:ss", new Date());
  return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : value;
}

/** `ga:sessions` -> `sessions` */
export function stripNamespace(name: string): string {
  return name.replace(/^\w+:/, "");
}

export function buildColumnHeaders(columnHeader: ColumnHeader): ColumnHeaders {
  return {
    dimensions: columnHeader.dimensions.map((name) => ({
      name: stripNamespace(name),
      type: STRING_TYPE_HINT,
    })),
    metrics: columnHeader.metricHeader.metricHeaderEntries.map((entry) => ({
      name: stripNamespace(entry.name),
      type: metricTypeHint(entry.type),
    })),
  };
}

/** Columns of every output record, in the order they are written. */
export function outputColumns(headers: ColumnHeaders): ColumnDef[] {
  return [
    ...headers.dimensions,
    ...headers.metrics,
    { name: "viewid", type: STRING_TYPE_HINT },
    { name: "timestamp", type: STRING_TYPE_HINT },
  ].map((column) => ({ name: column.name.toLowerCase(), type: column.type }));
}

/**
 * One record per (row, metric value-group). Rows whose value counts differ
 * from the header counts are rejected.
 */
export function flattenReport(report: Report, task: TaskMetadata): FlattenedReport {
  const headers = buildColumnHeaders(report.columnHeader);
  const dimensionKeys = headers.dimensions.map((c) => c.name.toLowerCase());
  const metricKeys = headers.metrics.map((c) => c.name.toLowerCase());
  const records: OutputRecord[] = [];

  report.data.rows.forEach((row, rowIndex) => {
    if (row.dimensions.length !== dimensionKeys.length) {
      throw new RowAlignmentError(
        rowIndex,
        "dimension",
        dimensionKeys.length,
        row.dimensions.length,
      );
    }

    // Entries, not assignment: a column named __proto__ must stay a field.
    const dimensionEntries = row.dimensions.map((value, i): [string, string] => [
      dimensionKeys[i],
      value,
    ]);

    for (const group of row.metrics) {
      if (group.values.length !== metricKeys.length) {
        throw new RowAlignmentError(rowIndex, "metric", metricKeys.length, group.values.length);
      }

      records.push(
        Object.fromEntries([
          ...dimensionEntries,
          ...group.values.map((value, i): [string, string] => [metricKeys[i], value]),
          ["viewid", task.viewId],
          ["timestamp", task.since],
        ]),
      );
    }
  });

  return { headers, records };
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export class ReportExtractionStrategy implements ExtractionStrategy {
  private client: ReportingClient;
  private query: ReportQuery;

  constructor(client: ReportingClient, query: ReportQuery) {
    this.client = client;
    this.query = query;
  }

  async extract(task: TaskMetadata): Promise<Report> {
    const startDate = normalizeDate(task.since);
    const endDate = normalizeDate(task.until);
    logger.info({ viewId: task.viewId, startDate, endDate }, "Requesting report");

    return this.client.fetchReport({
      viewId: task.viewId,
      startDate,
      endDate,
      samplingLevel: this.query.samplingLevel,
      dimensions: this.query.dimensions,
      metrics: this.query.metrics,
      pageSize: this.query.pageSize,
      includeEmptyRows: this.query.includeEmptyRows,
    });
  }
}

// ---------------------------------------------------------------------------
// Transform
// ---------------------------------------------------------------------------

export class ReportFlattenTransformStrategy implements TransformStrategy {
  async transform(task: TaskMetadata, report: Report): Promise<FlattenedReport> {
    return flattenReport(report, task);
  }
}
