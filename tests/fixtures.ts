/**
 * Shared test fixtures: mini reports, a fake reporting client, recording storage.
 */
import { mkdtempSync } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { ReportingClient } from "../src/analytics/client.js";
import { ReportSchema, type Report } from "../src/analytics/schemas.js";
import type { ReportRequest, TaskMetadata } from "../src/core/types.js";
import type { StorageBackend } from "../src/storage/backend.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "report-export-test-"));
}

// ---------------------------------------------------------------------------
// Mini reports
// ---------------------------------------------------------------------------

export const COUNTRY_SESSIONS_REPORT: Report = ReportSchema.parse({
  columnHeader: {
    dimensions: ["ga:country"],
    metricHeader: {
      metricHeaderEntries: [{ name: "ga:sessions", type: "INTEGER" }],
    },
  },
  data: {
    rows: [{ dimensions: ["US"], metrics: [{ values: ["42"] }] }],
  },
});

export const TWO_RANGE_REPORT: Report = ReportSchema.parse({
  columnHeader: {
    dimensions: ["ga:country", "ga:pagePath"],
    metricHeader: {
      metricHeaderEntries: [
        { name: "ga:sessions", type: "INTEGER" },
        { name: "ga:bounceRate", type: "PERCENT" },
      ],
    },
  },
  data: {
    rows: [
      {
        dimensions: ["DE", "/pricing"],
        metrics: [{ values: ["10", "55.5"] }, { values: ["12", "40.0"] }],
      },
    ],
  },
});

export function makeTask(overrides: Partial<TaskMetadata> = {}): TaskMetadata {
  return {
    viewId: "123",
    since: "2021-05-01",
    until: "2021-05-02",
    bucket: "exports",
    key: "ga/2021-05-01.ndjson",
    ...overrides,
  };
}

export const TASK_PARAMS = {
  viewId: "123",
  since: "2021-05-01",
  until: "2021-05-02",
  dimensions: ["ga:country"],
  metrics: ["ga:sessions"],
  bucket: "exports",
  key: "ga/2021-05-01.ndjson",
};

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

export class FakeReportingClient implements ReportingClient {
  requests: ReportRequest[] = [];

  constructor(private readonly result: Report | Error) {}

  async fetchReport(request: ReportRequest): Promise<Report> {
    this.requests.push(request);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export interface RecordedUpload {
  bucket: string;
  key: string;
  filePath: string;
  content: string;
}

/** Captures what was staged at upload time; optionally fails after capturing. */
export class RecordingStorage implements StorageBackend {
  uploads: RecordedUpload[] = [];

  constructor(private readonly failWith?: Error) {}

  async upload(bucket: string, key: string, filePath: string): Promise<void> {
    const content = await readFile(filePath, "utf8");
    this.uploads.push({ bucket, key, filePath, content });
    if (this.failWith) throw this.failWith;
  }

  async read(bucket: string, key: string): Promise<Uint8Array> {
    const found = this.uploads.find((u) => u.bucket === bucket && u.key === key);
    if (!found) throw new Error(`No object at ${bucket}/${key}`);
    return new TextEncoder().encode(found.content);
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    return this.uploads.some((u) => u.bucket === bucket && u.key === key);
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export interface FakeResponse {
  status?: number;
  body: unknown;
}

export interface RecordedCall {
  url: string;
  init: RequestInit;
}

/** A fetch stand-in that serves `responses` in order. */
export function fakeFetch(responses: FakeResponse[]): {
  fetch: typeof fetch;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init: init ?? {} });
    const next = responses[calls.length - 1];
    if (!next) throw new Error(`Unexpected request #${calls.length}`);
    const text = typeof next.body === "string" ? next.body : JSON.stringify(next.body);
    return new Response(text, {
      status: next.status ?? 200,
      headers: { "Content-Type": "application/json" },
    });
  };
  return { fetch: impl, calls };
}
