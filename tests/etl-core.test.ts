/**
 * Unit tests for the ETL pipeline and the NDJSON upload strategy.
 */
import { readdirSync } from "node:fs";
import { describe, test, expect } from "vitest";
import type { Report } from "../src/analytics/schemas.js";
import {
  ETLPipeline,
  NdjsonUploadStrategy,
  toNdjson,
  type ExtractionStrategy,
  type TransformStrategy,
} from "../src/core/etl.js";
import {
  ExtractionFailedException,
  TransformFailedException,
  UploadFailedException,
} from "../src/core/exceptions.js";
import type { FlattenedReport, TaskMetadata } from "../src/core/types.js";
import {
  COUNTRY_SESSIONS_REPORT,
  RecordingStorage,
  makeTask,
  makeTmpDir,
  pathExists,
} from "./fixtures.js";

class MockExtraction implements ExtractionStrategy {
  async extract(): Promise<Report> {
    return COUNTRY_SESSIONS_REPORT;
  }
}

class MockTransform implements TransformStrategy {
  async transform(task: TaskMetadata, report: Report): Promise<FlattenedReport> {
    return {
      headers: { dimensions: [], metrics: [] },
      records: report.data.rows.map((row) => ({
        country: row.dimensions[0],
        viewid: task.viewId,
      })),
    };
  }
}

class FailingExtraction implements ExtractionStrategy {
  async extract(): Promise<Report> {
    throw new Error("boom");
  }
}

class FailingTransform implements TransformStrategy {
  async transform(): Promise<FlattenedReport> {
    throw new Error("kaboom");
  }
}

const task = makeTask();

describe("ETLPipeline", () => {
  test("full run", async () => {
    const storage = new RecordingStorage();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(),
      transform: new MockTransform(),
      upload: new NdjsonUploadStrategy(makeTmpDir()),
      storage,
    });

    const result = await pipeline.run(task);

    expect(result.records).toEqual([{ country: "US", viewid: "123" }]);
    expect(storage.uploads).toHaveLength(1);
    expect(storage.uploads[0].bucket).toBe("exports");
    expect(storage.uploads[0].key).toBe("ga/2021-05-01.ndjson");
    expect(storage.uploads[0].content).toBe('{"country":"US","viewid":"123"}\n');
  });

  test("extract failure", async () => {
    const pipeline = new ETLPipeline({
      extraction: new FailingExtraction(),
      transform: new MockTransform(),
      storage: new RecordingStorage(),
    });
    await expect(pipeline.run(task)).rejects.toThrow(ExtractionFailedException);
  });

  test("extract failure carries task context", async () => {
    const pipeline = new ETLPipeline({
      extraction: new FailingExtraction(),
      transform: new MockTransform(),
      storage: new RecordingStorage(),
    });
    const err = await pipeline.run(task).catch((e: unknown) => e);
    if (!(err instanceof ExtractionFailedException)) {
      throw new Error(`expected ExtractionFailedException, got ${String(err)}`);
    }
    expect(err.message).toBe(
      "Extraction failed (view 123, 2021-05-01 to 2021-05-02, destination exports/ga/2021-05-01.ndjson): boom",
    );
    expect(err.task).toEqual(task);
    expect(err.cause).toBeInstanceOf(Error);
  });

  test("transform failure", async () => {
    const storage = new RecordingStorage();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(),
      transform: new FailingTransform(),
      storage,
    });
    await expect(pipeline.run(task)).rejects.toThrow(TransformFailedException);
    expect(storage.uploads).toEqual([]);
  });

  test("upload failure", async () => {
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(),
      transform: new MockTransform(),
      upload: new NdjsonUploadStrategy(makeTmpDir()),
      storage: new RecordingStorage(new Error("bucket not found")),
    });
    await expect(pipeline.run(task)).rejects.toThrow(UploadFailedException);
  });
});

describe("NdjsonUploadStrategy", () => {
  test("writes one line per record", () => {
    expect(toNdjson([{ a: "1" }, { a: "2" }])).toBe('{"a":"1"}\n{"a":"2"}\n');
    expect(toNdjson([])).toBe("");
  });

  test("releases the staging file after upload", async () => {
    const tmpRoot = makeTmpDir();
    const storage = new RecordingStorage();
    const strategy = new NdjsonUploadStrategy(tmpRoot);

    const count = await strategy.upload(task, [{ a: "1" }, { a: "2" }], storage);

    expect(count).toBe(2);
    expect(storage.uploads).toHaveLength(1);
    expect(storage.uploads[0].content).toBe('{"a":"1"}\n{"a":"2"}\n');
    expect(await pathExists(storage.uploads[0].filePath)).toBe(false);
    expect(readdirSync(tmpRoot)).toEqual([]);
  });

  test("releases the staging file when the upload throws", async () => {
    const tmpRoot = makeTmpDir();
    const storage = new RecordingStorage(new Error("denied"));
    const strategy = new NdjsonUploadStrategy(tmpRoot);

    await expect(strategy.upload(task, [{ a: "1" }], storage)).rejects.toThrow("denied");

    expect(storage.uploads).toHaveLength(1);
    expect(await pathExists(storage.uploads[0].filePath)).toBe(false);
    expect(readdirSync(tmpRoot)).toEqual([]);
  });

  test("uploads an empty object for zero records", async () => {
    const storage = new RecordingStorage();
    const count = await new NdjsonUploadStrategy(makeTmpDir()).upload(task, [], storage);
    expect(count).toBe(0);
    expect(storage.uploads[0].content).toBe("");
  });
});
