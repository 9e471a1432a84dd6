/**
 * Custom exceptions for the report export task.
 */
import type { TaskMetadata } from "./types.js";

function describeTask(task: TaskMetadata): string {
  return `view ${task.viewId}, ${task.since} to ${task.until}, destination ${task.bucket}/${task.key}`;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Base class for failures of a single pipeline step. */
export abstract class PipelineStepException extends Error {
  readonly task: TaskMetadata;

  constructor(step: string, task: TaskMetadata, cause: unknown) {
    super(`${step} failed (${describeTask(task)}): ${describeCause(cause)}`, {
      cause,
    });
    this.task = task;
  }
}

export class ExtractionFailedException extends PipelineStepException {
  constructor(task: TaskMetadata, cause: unknown) {
    super("Extraction", task, cause);
    this.name = "ExtractionFailedException";
  }
}

export class TransformFailedException extends PipelineStepException {
  constructor(task: TaskMetadata, cause: unknown) {
    super("Transform", task, cause);
    this.name = "TransformFailedException";
  }
}

export class UploadFailedException extends PipelineStepException {
  constructor(task: TaskMetadata, cause: unknown) {
    super("Upload", task, cause);
    this.name = "UploadFailedException";
  }
}

/** Invalid task or backend configuration. Raised before any network call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Non-success response from the reporting API. */
export class ReportingApiError extends Error {
  status: number;
  body: string;

  constructor(status: number, body: string, message?: string) {
    super(message ?? `Reporting API responded with HTTP ${status}: ${body}`);
    this.name = "ReportingApiError";
    this.status = status;
    this.body = body;
  }
}

/** A report row whose values do not line up with the column headers. */
export class RowAlignmentError extends Error {
  rowIndex: number;
  expected: number;
  actual: number;

  constructor(rowIndex: number, kind: "dimension" | "metric", expected: number, actual: number) {
    super(
      `Row ${rowIndex} has ${actual} ${kind} values but the report declares ${expected} ${kind} headers`,
    );
    this.name = "RowAlignmentError";
    this.rowIndex = rowIndex;
    this.expected = expected;
    this.actual = actual;
  }
}
