import { describe, it, expect, beforeEach } from "vitest";
import { DatasetUnavailableError } from "../errors.js";
import { InMemoryRecordStore, pointRecord, type StoredRecord } from "../testing/in-memory-store.js";
import { SpatialAssignmentEngine } from "./assignment-engine.js";
import { RunContext } from "./run-context.js";

function createStore(records: StoredRecord[]): InMemoryRecordStore {
  return new InMemoryRecordStore(records)
    .addBoundary("region", { code: "N1", minX: 0, minY: 0, maxX: 10, maxY: 10 })
    .addBoundary("district", { code: "D0001", minX: 0, minY: 0, maxX: 5, maxY: 10 })
    .addBoundary("district", { code: "D0002", minX: 5.000001, minY: 0, maxX: 10, maxY: 10 });
}

function createEngine(store: InMemoryRecordStore, batchSize = 250) {
  const context = new RunContext(store);
  const engine = new SpatialAssignmentEngine(store, context, { batchSize, targetDatasetId: "target_points" });
  return { engine, context };
}

describe("SpatialAssignmentEngine", () => {
  let store: InMemoryRecordStore;

  beforeEach(() => {
    store = createStore([pointRecord(1, 2, 3), pointRecord(2, 7, 3), pointRecord(3, 20, 20)]);
  });

  it("assigns region and district codes from the first intersecting boundary", async () => {
    const { engine } = createEngine(store);
    const result = await engine.process({ mode: "all" });

    expect(result.processedCount).toBe(3);
    expect(result.assignments.map((a) => [a.objectId, a.regionCode, a.districtCode, a.intersectionQuality])).toEqual([
      [1, "N1", "D0001", 1],
      [2, "N1", "D0002", 1],
      [3, null, null, 0],
    ]);
    expect(result.assignments.map((a) => a.processingMethod)).toEqual([
      "FULL_INTERSECTION",
      "FULL_INTERSECTION",
      "FALLBACK_ASSIGNMENT",
    ]);
    expect(result.metrics.successfulAssignments).toBe(2);
    expect(result.metrics.failedAssignments).toBe(1);
    expect(result.metrics.totalLookups).toBe(6);
    expect(result.assignmentSummary.byStatus).toEqual({
      both_assigned: 2,
      region_only: 0,
      district_only: 0,
      no_assignment: 1,
    });
  });

  it("reuses the cached assignment for a point with the same rounded coordinates", async () => {
    store = createStore([pointRecord(1, 2, 3), pointRecord(2, 2.0000001, 3.0000002)]);
    const { engine } = createEngine(store);

    const result = await engine.process({ mode: "all" });
    const [first, second] = result.assignments;

    expect(second).toMatchObject({
      objectId: 2,
      regionCode: first?.regionCode,
      districtCode: first?.districtCode,
      processingMethod: "CACHED_INTERSECTION",
    });
    expect(store.calls.spatialQuery).toBe(2);
    expect(result.metrics.totalLookups).toBe(2);
    expect(result.metrics.cacheHits).toBe(1);
    expect(result.metrics.cacheHitRate).toBe(0.5);
  });

  it("gives the same assignment for the same record across runs", async () => {
    const first = await createEngine(store).engine.process({ mode: "records", objectIds: [2] });
    const second = await createEngine(store).engine.process({ mode: "records", objectIds: [2] });

    const pick = (a: (typeof first.assignments)[number] | undefined) => [
      a?.regionCode,
      a?.districtCode,
      a?.intersectionQuality,
    ];
    expect(pick(second.assignments[0])).toEqual(pick(first.assignments[0]));
    expect(pick(first.assignments[0])).toEqual(["N1", "D0002", 1]);
  });

  it("marks records without usable geometry for repair and skips the lookups", async () => {
    store = createStore([pointRecord(1, 2, 3, { geometry: null })]);
    const { engine } = createEngine(store);

    const result = await engine.process({ mode: "all" });

    expect(result.assignments[0]).toMatchObject({
      objectId: 1,
      regionCode: null,
      districtCode: null,
      intersectionQuality: 0,
      processingMethod: "GEOMETRY_REPAIR",
      geometryValid: false,
    });
    expect(store.calls.spatialQuery).toBe(0);
  });

  it("records a failed lookup against the batch and keeps it out of the cache", async () => {
    store = createStore([pointRecord(1, 2, 3), pointRecord(2, 2, 3)]);
    store.injectFailure("spatialQuery", (call) => (call === 1 ? new Error("region query timed out") : null));
    const { engine } = createEngine(store);

    const result = await engine.process({ mode: "all" });
    const batch = result.batchResults[0];

    expect(result.assignments[0]).toMatchObject({ regionCode: null, districtCode: "D0001", intersectionQuality: 0.5 });
    expect(result.assignments[1]).toMatchObject({
      regionCode: "N1",
      districtCode: "D0001",
      processingMethod: "FULL_INTERSECTION",
    });
    expect(batch?.errorCount).toBe(1);
    expect(batch?.errors).toEqual(["Record 1: region lookup failed: region query timed out"]);
  });

  it("pages through all records in fixed-size batches", async () => {
    store = createStore([1, 2, 3, 4, 5].map((id) => pointRecord(id, id, 1)));
    const { engine } = createEngine(store, 2);

    const result = await engine.process({ mode: "all" });

    expect(result.batchResults.map((b) => [b.batchNumber, b.recordsProcessed])).toEqual([
      [1, 2],
      [2, 2],
      [3, 1],
    ]);
    expect(result.assignments.map((a) => a.objectId)).toEqual([1, 2, 3, 4, 5]);
  });

  it("reads only the requested records in incremental mode", async () => {
    const { engine } = createEngine(store);

    const result = await engine.process({ mode: "records", objectIds: [3, 1] });

    expect(result.assignments.map((a) => a.objectId)).toEqual([1, 3]);
    expect(store.calls.count).toBe(0);
  });

  it("throws DatasetUnavailableError when the first read fails", async () => {
    store.injectFailure("query", () => new Error('relation "target_points" does not exist'));
    const { engine } = createEngine(store);

    await expect(engine.process({ mode: "all" })).rejects.toBeInstanceOf(DatasetUnavailableError);
  });

  it("throws DatasetUnavailableError when the record count fails", async () => {
    store.injectFailure("count", () => new Error("connection refused"));
    const { engine } = createEngine(store);

    await expect(engine.process({ mode: "all" })).rejects.toThrow(
      "Dataset target_points is unavailable: connection refused",
    );
  });

  it("reports a later unreadable page and carries on", async () => {
    store = createStore([1, 2, 3, 4, 5].map((id) => pointRecord(id, id, 1)));
    store.injectFailure("query", (call) => (call === 2 ? new Error("connection reset") : null));
    const { engine } = createEngine(store, 2);

    const result = await engine.process({ mode: "all" });
    const failed = result.batchResults[1];

    expect(failed).toMatchObject({ batchNumber: 2, fetchFailed: true, recordsProcessed: 2, errorCount: 2 });
    expect(failed?.errors).toEqual(["Batch 2: failed to read records: connection reset"]);
    expect(result.assignments.map((a) => a.objectId)).toEqual([1, 2, 5]);
  });

  it("stops at the next batch boundary once cancelled", async () => {
    store = createStore([1, 2, 3, 4].map((id) => pointRecord(id, id, 1)));
    const { engine } = createEngine(store, 2);
    const controller = new AbortController();

    const seen: number[] = [];
    for await (const batch of engine.batches({ mode: "all" }, controller.signal)) {
      seen.push(batch.batchResult.batchNumber);
      controller.abort();
    }

    expect(seen).toEqual([1]);
    expect(engine.cancelled).toBe(true);
  });

  it("opens the boundaries once per run", async () => {
    const { engine, context } = createEngine(store, 1);
    await engine.process({ mode: "all" });

    expect(store.calls.describeBoundary).toBe(2);
    expect(context.getCacheStatistics().boundariesOpen).toBe(true);
    context.clear();
    expect(context.getCacheStatistics()).toEqual({
      boundariesOpen: false,
      assignmentCacheSize: 0,
      cacheHits: 0,
      cacheMisses: 0,
    });
  });

  it("rejects a batch size outside 1-5000", () => {
    expect(() => createEngine(store, 0)).toThrow(RangeError);
    expect(() => createEngine(store, 5001)).toThrow(RangeError);
  });
});
