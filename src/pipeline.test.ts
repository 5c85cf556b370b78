import { describe, it, expect, beforeEach } from "vitest";
import { DEFAULT_PIPELINE_OPTIONS, type PipelineOptions } from "./config.js";
import { SpatialSyncPipeline } from "./pipeline.js";
import { InMemoryMetadataStore, InMemoryRecordStore, pointRecord } from "./testing/in-memory-store.js";

const FIRST_RUN = new Date("2024-05-31T00:00:00Z");
const SECOND_RUN = new Date("2024-06-01T00:00:00Z");

describe("SpatialSyncPipeline", () => {
  let store: InMemoryRecordStore;
  let metadataStore: InMemoryMetadataStore;
  let clock: Date;

  function createPipeline(options: Partial<PipelineOptions> = {}): SpatialSyncPipeline {
    return new SpatialSyncPipeline({
      store,
      metadataStore,
      options: { ...DEFAULT_PIPELINE_OPTIONS, batchSize: 4, ...options },
      now: () => clock,
    });
  }

  function edit(objectId: number, at: Date): void {
    const record = store.get(objectId);
    if (record !== undefined) store.records.set(objectId, { ...record, editTimestamp: at });
  }

  beforeEach(() => {
    store = new InMemoryRecordStore(Array.from({ length: 10 }, (_, i) => pointRecord(i + 1, i + 0.5, 1)))
      .addBoundary("region", { code: "N1", minX: 0, minY: 0, maxX: 10, maxY: 10 })
      .addBoundary("district", { code: "D0001", minX: 0, minY: 0, maxX: 5, maxY: 10 })
      .addBoundary("district", { code: "D0002", minX: 5.000001, minY: 0, maxX: 10, maxY: 10 });
    metadataStore = new InMemoryMetadataStore();
    clock = FIRST_RUN;
  });

  it("processes every record on the first run and records the run", async () => {
    const result = await createPipeline().run();

    expect(result).toMatchObject({
      success: true,
      processingType: "FULL_REPROCESSING",
      recordsProcessed: 10,
      recordsUpdated: 10,
      recordsFailed: 0,
      metadataWritten: true,
      cancelled: false,
      errors: [],
    });
    expect(store.get(1)).toMatchObject({ regionCode: "N1", districtCode: "D0001" });
    expect(store.get(10)).toMatchObject({ regionCode: "N1", districtCode: "D0002" });
    expect(metadataStore.rows).toHaveLength(1);
    expect(metadataStore.rows[0]?.processTimestamp).toEqual(FIRST_RUN);
  });

  it("uses the recorded run as the next baseline", async () => {
    await createPipeline().run();
    edit(3, new Date("2024-05-31T12:00:00Z"));
    clock = SECOND_RUN;

    const result = await createPipeline().run();

    expect(result.processingType).toBe("INCREMENTAL_UPDATE");
    expect(result.decision?.targetRecords).toEqual([3]);
    expect(result.decision?.incrementalFilters?.sinceTimestamp).toBe("2024-05-31T00:00:00.000Z");
    expect(result.recordsProcessed).toBe(1);
    expect(metadataStore.rows).toHaveLength(2);
  });

  it("does nothing when no record changed since the last run", async () => {
    await createPipeline().run();
    clock = SECOND_RUN;
    const writesBefore = store.calls.batchWrite;

    const result = await createPipeline().run();

    expect(result).toMatchObject({
      success: true,
      processingType: "NO_PROCESSING_NEEDED",
      recordsProcessed: 0,
      recordsUpdated: 0,
      metadataWritten: false,
    });
    expect(store.calls.batchWrite).toBe(writesBefore);
    expect(metadataStore.rows).toHaveLength(1);
  });

  it("writes nothing in a dry run", async () => {
    const result = await createPipeline().run({ dryRun: true });

    expect(result.success).toBe(true);
    expect(result.recordsProcessed).toBe(10);
    expect(result.metadataWritten).toBe(false);
    expect(store.calls.batchWrite).toBe(0);
    expect(store.get(1)?.regionCode).toBeNull();
    expect(metadataStore.rows).toEqual([]);
  });

  it("skips change detection when a full update is forced", async () => {
    await createPipeline().run();
    clock = SECOND_RUN;

    const result = await createPipeline().run({ forceFull: true });

    expect(result.processingType).toBe("FORCE_FULL_UPDATE");
    expect(result.decision?.reasoning).toBe("Full update requested, change detection skipped");
    expect(result.recordsProcessed).toBe(10);
  });

  it("stops at a batch boundary when cancelled and records nothing", async () => {
    const controller = new AbortController();
    store.injectFailure("batchWrite", () => {
      controller.abort();
      return null;
    });

    const result = await createPipeline().run({ signal: controller.signal });

    expect(result).toMatchObject({
      success: false,
      cancelled: true,
      recordsProcessed: 4,
      recordsUpdated: 4,
      metadataWritten: false,
    });
    expect(store.calls.batchWrite).toBe(1);
    expect(metadataStore.rows).toEqual([]);
  });

  it("reports unreachable boundary datasets without processing anything", async () => {
    store.injectFailure("describeBoundary", () => new Error('relation "region_boundaries" does not exist'));

    const result = await createPipeline().run();

    expect(result).toMatchObject({
      success: false,
      processingType: null,
      recordsProcessed: 0,
      recordsUpdated: 0,
      recordsFailed: 0,
      metadataWritten: false,
      errors: ['Boundary datasets unavailable: relation "region_boundaries" does not exist'],
    });
    expect(store.calls.query).toBe(0);
  });

  it("reports an unreadable target dataset", async () => {
    store.injectFailure("count", () => new Error("connection refused"));

    const result = await createPipeline().run();

    expect(result.success).toBe(false);
    expect(result.processingType).toBe("FULL_REPROCESSING");
    expect(result.errors).toEqual(["Dataset target_points is unavailable: connection refused"]);
    expect(metadataStore.rows).toEqual([]);
  });

  it("keeps the baseline when too few records were updated", async () => {
    for (const id of [1, 2, 3]) store.rejectWrites.set(id, "row is locked");

    const result = await createPipeline().run();

    expect(result.success).toBe(true);
    expect(result.recordsUpdated).toBe(7);
    expect(result.recordsFailed).toBe(3);
    expect(result.metadataWritten).toBe(false);
    expect(metadataStore.rows).toEqual([]);
  });

  it("counts records in an unreadable page as failed", async () => {
    store.injectFailure("query", (call) => (call === 3 ? new Error("connection reset") : null));

    const result = await createPipeline().run();

    expect(result.recordsProcessed).toBe(10);
    expect(result.recordsUpdated).toBe(6);
    expect(result.recordsFailed).toBe(4);
    expect(result.errors).toContain("Batch 2: failed to read records: connection reset");
  });

  it("refuses to run against a target dataset missing a required column", async () => {
    store.dropColumn("target_points", "edit_timestamp");

    const result = await createPipeline().run();

    expect(result).toMatchObject({
      success: false,
      processingType: null,
      recordsProcessed: 0,
      metadataWritten: false,
      errors: ["Schema validation failed: Dataset target_points is missing columns: edit_timestamp"],
    });
    expect(store.calls.describeBoundary).toBe(0);
    expect(store.calls.count).toBe(0);
  });

  it("refuses to run without a metadata table", async () => {
    metadataStore.missingColumns = null;

    const result = await createPipeline().run();

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Schema validation failed: Dataset process_metadata does not exist"]);
    expect(store.calls.batchWrite).toBe(0);
  });

  it("reports a schema check that cannot run", async () => {
    store.injectFailure("checkSchema", () => new Error("connection refused"));

    const result = await createPipeline().run();

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Schema check failed: connection refused"]);
  });

  it("lists every schema problem", async () => {
    store.dropColumn("region_boundaries", "code").dropDataset("district_boundaries");
    metadataStore.missingColumns = ["metadata_details"];

    const validation = await createPipeline().validateSchema();

    expect(validation.isValid).toBe(false);
    expect(validation.checks.map((c) => c.datasetId)).toEqual([
      "target_points",
      "region_boundaries",
      "district_boundaries",
      "process_metadata",
    ]);
    expect(validation.problems).toEqual([
      "Dataset region_boundaries is missing columns: code",
      "Dataset district_boundaries does not exist",
      "Dataset process_metadata is missing columns: metadata_details",
    ]);
  });

  it("passes the schema check for complete datasets", async () => {
    const validation = await createPipeline().validateSchema();

    expect(validation.isValid).toBe(true);
    expect(validation.problems).toEqual([]);
  });

  it("previews the decision without processing", async () => {
    const decision = await createPipeline().detect();

    expect(decision.processingType).toBe("FULL_REPROCESSING");
    expect(store.calls.batchWrite).toBe(0);
  });
});
