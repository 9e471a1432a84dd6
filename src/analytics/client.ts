/**
 * Reporting API client: batchGet requests with page-token pagination and
 * exponential backoff on transient failures.
 */
import { setTimeout as sleep } from "node:timers/promises";

import { ReportingApiError } from "../core/exceptions.js";
import type { ReportRequest } from "../core/types.js";
import { createLogger } from "../logger.js";
import {
  BatchGetResponseSchema,
  ReportSchema,
  type Report,
  type ReportRow,
} from "./schemas.js";

const logger = createLogger("reporting-client");

export const DEFAULT_REPORTING_ENDPOINT = "https://analyticsreporting.googleapis.com";

/** Fetches a whole report, all pages materialised. */
export interface ReportingClient {
  fetchReport(request: ReportRequest): Promise<Report>;
}

export interface GoogleAnalyticsClientOptions {
  accessToken: string;
  endpoint?: string;
  /** Attempts per page request, including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry in ms, doubled on each retry (default: 1000) */
  minDelay?: number;
  /** Upper bound for a single retry delay in ms (default: 30000) */
  maxDelay?: number;
  fetch?: typeof fetch;
}

function isTransientError(error: unknown): boolean {
  if (error instanceof ReportingApiError) {
    return error.status === 429 || error.status >= 500;
  }
  // fetch() rejects with a TypeError on network failures
  return error instanceof TypeError;
}

export class GoogleAnalyticsReportingClient implements ReportingClient {
  private accessToken: string;
  private endpoint: string;
  private maxAttempts: number;
  private minDelay: number;
  private maxDelay: number;
  private fetchImpl: typeof fetch;

  constructor(options: GoogleAnalyticsClientOptions) {
    this.accessToken = options.accessToken;
    this.endpoint = (options.endpoint ?? DEFAULT_REPORTING_ENDPOINT).replace(/\/+$/, "");
    this.maxAttempts = options.maxAttempts ?? 3;
    this.minDelay = options.minDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 30000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetchReport(request: ReportRequest): Promise<Report> {
    const first = await this.fetchPage(request);
    const rows: ReportRow[] = [...first.data.rows];
    let pageToken = first.nextPageToken;
    let pages = 1;
    const seenTokens = new Set<string>();

    while (pageToken) {
      if (seenTokens.has(pageToken)) {
        throw new ReportingApiError(
          200,
          pageToken,
          `Reporting API returned page token "${pageToken}" twice`,
        );
      }
      seenTokens.add(pageToken);
      const next = await this.fetchPage(request, pageToken);
      rows.push(...next.data.rows);
      pageToken = next.nextPageToken;
      pages++;
    }

    logger.info(
      { viewId: request.viewId, pages, rows: rows.length },
      "Fetched report",
    );

    return { columnHeader: first.columnHeader, data: { rows } };
  }

  /** Build the batchGet body for one page. */
  buildRequestBody(request: ReportRequest, pageToken?: string) {
    return {
      reportRequests: [
        {
          viewId: request.viewId,
          dateRanges: [{ startDate: request.startDate, endDate: request.endDate }],
          ...(request.samplingLevel ? { samplingLevel: request.samplingLevel } : {}),
          dimensions: request.dimensions.map((name) => ({ name })),
          metrics: request.metrics.map((expression) => ({ expression })),
          pageSize: request.pageSize,
          ...(pageToken ? { pageToken } : {}),
          includeEmptyRows: request.includeEmptyRows,
        },
      ],
    };
  }

  private async fetchPage(request: ReportRequest, pageToken?: string): Promise<Report> {
    const body = JSON.stringify(this.buildRequestBody(request, pageToken));
    logger.debug({ viewId: request.viewId, pageToken }, "Requesting report page");

    const response = await this.withRetry(async () => {
      const res = await this.fetchImpl(`${this.endpoint}/v4/reports:batchGet`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          "Content-Type": "application/json",
        },
        body,
      });
      if (!res.ok) {
        throw new ReportingApiError(res.status, await res.text());
      }
      const json: unknown = await res.json();
      return BatchGetResponseSchema.parse(json);
    });

    return response.reports[0] ?? ReportSchema.parse({});
  }

  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.maxAttempts || !isTransientError(error)) {
          throw error;
        }
        const delay = Math.min(this.minDelay * 2 ** (attempt - 1), this.maxDelay);
        logger.warn(
          {
            attempt,
            maxAttempts: this.maxAttempts,
            delay,
            error: error instanceof Error ? error.message : String(error),
          },
          "Retrying report page request",
        );
        await sleep(delay);
      }
    }
  }
}
