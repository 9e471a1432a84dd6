/**
 * Zod schemas for the reporting API batchGet response.
 *
 * Every collection defaults to empty so a sparse payload parses into the
 * same shape as a full one.
 */
import { z } from "zod";

export const MetricHeaderEntrySchema = z.object({
  name: z.string(),
  type: z.string().default("METRIC_TYPE_UNSPECIFIED"),
});

export const ColumnHeaderSchema = z.object({
  dimensions: z.array(z.string()).default([]),
  metricHeader: z
    .object({
      metricHeaderEntries: z.array(MetricHeaderEntrySchema).default([]),
    })
    .default({}),
});

export const DateRangeValuesSchema = z.object({
  values: z.array(z.string()).default([]),
});

export const ReportRowSchema = z.object({
  dimensions: z.array(z.string()).default([]),
  metrics: z.array(DateRangeValuesSchema).default([]),
});

export const ReportSchema = z.object({
  columnHeader: ColumnHeaderSchema.default({}),
  data: z
    .object({
      rows: z.array(ReportRowSchema).default([]),
    })
    .default({}),
  nextPageToken: z.string().optional(),
});

export const BatchGetResponseSchema = z.object({
  reports: z.array(ReportSchema).default([]),
});

export type ColumnHeader = z.infer<typeof ColumnHeaderSchema>;
export type ReportRow = z.infer<typeof ReportRowSchema>;
export type Report = z.infer<typeof ReportSchema>;
