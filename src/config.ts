/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";

import { GoogleAnalyticsReportingClient, type ReportingClient } from "./analytics/client.js";
import { ConfigurationError } from "./core/exceptions.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";

export const MAX_PAGE_SIZE = 10000;

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

export const TaskParamsSchema = z.object({
  viewId: z.string().min(1),
  since: z.string().min(1),
  until: z.string().min(1),
  dimensions: z.array(z.string()).default([]),
  metrics: z.array(z.string()).min(1),
  bucket: z.string().min(1),
  key: z.string().min(1),
  pageSize: z
    .number()
    .int()
    .positive()
    .max(MAX_PAGE_SIZE, `Please specify a page size equal to or lower than ${MAX_PAGE_SIZE}.`)
    .default(1000),
  includeEmptyRows: z
    .boolean({ invalid_type_error: 'Please specify "includeEmptyRows" as a boolean.' })
    .default(true),
  samplingLevel: z.enum(["DEFAULT", "SMALL", "LARGE"]).optional(),
});

const AnalyticsConfigSchema = z.object({
  provider: z.literal("google").default("google"),
  config: z.object({
    accessToken: z.string().min(1),
    endpoint: z.string().url().optional(),
    maxAttempts: z.number().int().positive().optional(),
    minDelay: z.number().nonnegative().optional(),
  }),
});

const StorageConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("disk"),
    config: z.object({ basePath: z.string().default("./data") }).default({}),
  }),
  z.object({
    provider: z.literal("s3"),
    config: z.object({
      endpoint: z.string().url().optional(),
      region: z.string().optional(),
      accessKeyId: z.string().min(1),
      secretAccessKey: z.string().min(1),
      prefix: z.string().optional(),
    }),
  }),
]);

export const ConfigSchema = z.object({
  analytics: AnalyticsConfigSchema,
  storage: StorageConfigSchema.default({ provider: "disk" }),
  task: TaskParamsSchema,
});

export type TaskParamsInput = z.input<typeof TaskParamsSchema>;
export type TaskParams = z.output<typeof TaskParamsSchema>;
type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return result.data;
}

/** Validate task parameters. Every invalid field is listed in the ConfigurationError. */
export function parseTaskParams(raw: unknown): TaskParams {
  return validate(TaskParamsSchema, raw);
}

export type TaskOverrides = Partial<Pick<TaskParams, "since" | "until" | "key">>;

/**
 * Replace fields of the raw config's "task" section. A malformed config is
 * returned untouched for validation to report.
 */
export function applyTaskOverrides(raw: unknown, overrides: TaskOverrides): unknown {
  if (typeof raw !== "object" || raw === null || !("task" in raw)) return raw;
  const task = raw.task;
  if (typeof task !== "object" || task === null) return raw;
  return { ...raw, task: { ...task, ...overrides } };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function buildStorage(config: Config["storage"]): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.config.basePath);
    case "s3":
      return new S3Storage(config.config);
  }
}

function buildClient(config: Config["analytics"]): ReportingClient {
  return new GoogleAnalyticsReportingClient(config.config);
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): {
  client: ReportingClient;
  storage: StorageBackend;
  task: TaskParams;
} {
  const config = validate(ConfigSchema, raw);
  return {
    client: buildClient(config.analytics),
    storage: buildStorage(config.storage),
    task: config.task,
  };
}
