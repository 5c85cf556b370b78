import { describe, it, expect, beforeEach } from "vitest";
import { calculateIntersectionQuality, type SpatialAssignment } from "../models/assignment.js";
import { InMemoryRecordStore, pointRecord } from "../testing/in-memory-store.js";
import { BatchUpdateCoordinator, type CoordinatorOptions } from "./batch-coordinator.js";

const OPTIONS: CoordinatorOptions = {
  batchSize: 250,
  validationEnabled: true,
  rollbackOnPartialFailure: false,
  rollbackThreshold: 0.5,
  rollbackStrategy: "clear",
};

function assignment(objectId: number, regionCode: string | null, districtCode: string | null): SpatialAssignment {
  return {
    objectId,
    regionCode,
    districtCode,
    intersectionQuality: calculateIntersectionQuality(regionCode, districtCode),
    processingMethod: regionCode === null && districtCode === null ? "FALLBACK_ASSIGNMENT" : "FULL_INTERSECTION",
    geometryValid: true,
    processingDurationMs: 1,
  };
}

const assigned = (...ids: number[]) => ids.map((id) => assignment(id, "N1", "D0001"));

describe("BatchUpdateCoordinator", () => {
  let store: InMemoryRecordStore;

  beforeEach(() => {
    store = new InMemoryRecordStore([
      pointRecord(1, 1, 1, { regionCode: "S2", districtCode: "D0009" }),
      pointRecord(2, 1, 1),
      pointRecord(3, 1, 1),
      pointRecord(4, 1, 1),
    ]);
  });

  it("writes only the codes an assignment found", async () => {
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    const batch = await coordinator.applyBatch(1, [assignment(1, "N1", null), assignment(2, "N1", "D0001")]);

    expect(batch.state).toBe("COMMITTED");
    expect(batch.stateHistory).toEqual(["PENDING", "VALIDATED", "FETCHED", "WRITTEN", "COMMITTED"]);
    expect(batch.successfulObjectIds).toEqual([1, 2]);
    expect(store.writes).toEqual([
      [
        { objectId: 1, regionCode: "N1" },
        { objectId: 2, regionCode: "N1", districtCode: "D0001" },
      ],
    ]);
    expect(store.get(1)).toMatchObject({ regionCode: "N1", districtCode: "D0009" });
    expect(store.get(2)).toMatchObject({ regionCode: "N1", districtCode: "D0001" });
  });

  it("accounts for every record in the batch as updated or failed", async () => {
    store.rejectWrites.set(2, "value too long for type character varying(5)");
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    const batch = await coordinator.applyBatch(1, [
      ...assigned(1, 2),
      assignment(3, null, null),
      assignment(9, "N1", "D0001"),
    ]);

    expect(batch.updatedCount + batch.failedCount).toBe(4);
    expect(batch.successfulObjectIds).toEqual([1]);
    expect(batch.failedObjectIds).toEqual([3, 9, 2]);
    expect(batch.errors).toEqual([
      "Record 3: no region or district assigned",
      "Record 9: not found",
      "Record 2: value too long for type character varying(5)",
    ]);
    expect(batch.state).toBe("COMMITTED");
  });

  it("fetches each batch's current records in one query", async () => {
    const coordinator = new BatchUpdateCoordinator(store, { ...OPTIONS, batchSize: 2 });

    const result = await coordinator.apply(assigned(1, 2, 3, 4));

    expect(result.batchUpdates).toHaveLength(2);
    expect(store.calls.query).toBe(2);
    expect(store.calls.batchWrite).toBe(2);
    expect(result.updatedCount).toBe(4);
    expect(result.failedCount).toBe(0);
  });

  it("rolls back a batch whose success rate falls below the threshold", async () => {
    for (const id of [2, 3, 4]) store.rejectWrites.set(id, "row is locked");
    const coordinator = new BatchUpdateCoordinator(store, { ...OPTIONS, rollbackOnPartialFailure: true });

    const result = await coordinator.apply(assigned(1, 2, 3, 4));
    const batch = result.batchUpdates[0];

    expect(batch?.state).toBe("ROLLED_BACK");
    expect(batch?.errors).toContain("Batch 1 rolled back: success rate 25.0% below threshold 50.0%");
    expect(batch?.rollback).toMatchObject({
      success: true,
      rollbackCount: 1,
      failedRollbackCount: 0,
      rolledBackObjectIds: [1],
    });
    expect(batch?.updatedCount).toBe(0);
    expect(batch?.failedObjectIds).toEqual([2, 3, 4, 1]);
    expect(result.rolledBackBatches).toBe(1);
    expect(store.get(1)).toMatchObject({ regionCode: null, districtCode: null });
  });

  it("restores the previous codes when configured to", async () => {
    for (const id of [2, 3, 4]) store.rejectWrites.set(id, "row is locked");
    const coordinator = new BatchUpdateCoordinator(store, {
      ...OPTIONS,
      rollbackOnPartialFailure: true,
      rollbackStrategy: "restore-previous",
    });

    await coordinator.applyBatch(1, assigned(1, 2, 3, 4));

    expect(store.writes[1]).toEqual([{ objectId: 1, regionCode: "S2", districtCode: "D0009" }]);
    expect(store.get(1)).toMatchObject({ regionCode: "S2", districtCode: "D0009" });
  });

  it("keeps a batch whose success rate meets the threshold", async () => {
    store.rejectWrites.set(3, "row is locked");
    store.rejectWrites.set(4, "row is locked");
    const coordinator = new BatchUpdateCoordinator(store, { ...OPTIONS, rollbackOnPartialFailure: true });

    const batch = await coordinator.applyBatch(1, assigned(1, 2, 3, 4));

    expect(batch.state).toBe("COMMITTED");
    expect(batch.rollback).toBeNull();
    expect(batch.successfulObjectIds).toEqual([1, 2]);
  });

  it("does not roll back a batch in which every write was rejected", async () => {
    store.rejectWrites.set(1, "row is locked");
    store.rejectWrites.set(2, "row is locked");
    const coordinator = new BatchUpdateCoordinator(store, { ...OPTIONS, rollbackOnPartialFailure: true });

    const batch = await coordinator.applyBatch(1, assigned(1, 2));

    expect(batch.state).toBe("COMMITTED");
    expect(batch.rollback).toBeNull();
    expect(batch.failedObjectIds).toEqual([1, 2]);
    expect(batch.errors).toEqual(["Record 1: row is locked", "Record 2: row is locked"]);
    expect(store.calls.query).toBe(1);
    expect(store.calls.batchWrite).toBe(1);
  });

  it("reports a rollback write that fails and does not retry it", async () => {
    for (const id of [2, 3, 4]) store.rejectWrites.set(id, "row is locked");
    store.injectFailure("batchWrite", (call) => (call === 2 ? new Error("connection reset") : null));
    const coordinator = new BatchUpdateCoordinator(store, { ...OPTIONS, rollbackOnPartialFailure: true });

    const batch = await coordinator.applyBatch(1, assigned(1, 2, 3, 4));

    expect(batch.rollback).toMatchObject({
      success: false,
      rollbackCount: 0,
      failedRollbackCount: 1,
      rolledBackObjectIds: [],
      errors: ["Rollback failed: connection reset"],
    });
    expect(batch.errors).toEqual([
      "Record 2: row is locked",
      "Record 3: row is locked",
      "Record 4: row is locked",
      "Batch 1 rollback failed, no updates reverted (success rate 25.0% below threshold 50.0%)",
      "Rollback failed: connection reset",
    ]);
    expect(batch.state).toBe("COMMITTED");
    expect(batch.successfulObjectIds).toEqual([1]);
    expect(store.calls.batchWrite).toBe(2);
    expect(store.get(1)).toMatchObject({ regionCode: "N1", districtCode: "D0001" });
  });

  it("reports records a rollback could not revert", async () => {
    store.rejectWrites.set(3, "row is locked");
    store.rejectWrites.set(4, "row is locked");
    store.injectFailure("batchWrite", (call) => {
      if (call === 2) store.rejectWrites.set(2, "row is locked");
      return null;
    });
    const coordinator = new BatchUpdateCoordinator(store, {
      ...OPTIONS,
      rollbackOnPartialFailure: true,
      rollbackThreshold: 0.75,
    });

    const batch = await coordinator.applyBatch(1, assigned(1, 2, 3, 4));

    expect(batch.state).toBe("ROLLED_BACK");
    expect(batch.rollback).toMatchObject({
      success: false,
      rollbackCount: 1,
      failedRollbackCount: 1,
      rolledBackObjectIds: [1],
      errors: ["Record 2: rollback failed: row is locked"],
    });
    expect(batch.errors).toContain(
      "Batch 1 partially rolled back: 1 of 2 updates reverted (success rate 50.0% below threshold 75.0%)",
    );
    expect(batch.successfulObjectIds).toEqual([2]);
    expect(batch.failedObjectIds).toEqual([3, 4, 1]);
    expect(store.calls.batchWrite).toBe(2);
    expect(store.get(1)).toMatchObject({ regionCode: null, districtCode: null });
    expect(store.get(2)).toMatchObject({ regionCode: "N1", districtCode: "D0001" });
  });

  it("never rolls back when rollback is disabled", async () => {
    for (const id of [2, 3, 4]) store.rejectWrites.set(id, "row is locked");
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    expect(coordinator.shouldRollBack(3, 0.25)).toBe(false);
    const batch = await coordinator.applyBatch(1, assigned(1, 2, 3, 4));
    expect(batch.state).toBe("COMMITTED");
    expect(store.calls.batchWrite).toBe(1);
  });

  it("fails the whole batch on a validation error without touching the store", async () => {
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    const batch = await coordinator.applyBatch(1, assigned(1, 2, 1));

    expect(batch.state).toBe("FAILED");
    expect(batch.stateHistory).toEqual(["PENDING", "FAILED"]);
    expect(batch.failedObjectIds).toEqual([1, 2, 1]);
    expect(batch.errors).toEqual(["Assignment 2 (object 1): duplicate object id"]);
    expect(store.calls.query).toBe(0);
  });

  it("fails a batch with nothing to write before fetching", async () => {
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    const batch = await coordinator.applyBatch(1, [assignment(1, null, null)]);

    expect(batch.stateHistory).toEqual(["PENDING", "VALIDATED", "FAILED"]);
    expect(store.calls.query).toBe(0);
  });

  it("fails the batch when the bulk fetch fails", async () => {
    store.injectFailure("query", () => new Error("connection reset"));
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    const batch = await coordinator.applyBatch(1, assigned(1, 2));

    expect(batch.state).toBe("FAILED");
    expect(batch.failedObjectIds).toEqual([1, 2]);
    expect(batch.errors).toEqual(["Batch 1: bulk fetch failed: connection reset"]);
    expect(store.calls.batchWrite).toBe(0);
  });

  it("fails the batch when the write throws", async () => {
    store.injectFailure("batchWrite", () => new Error("deadlock detected"));
    const coordinator = new BatchUpdateCoordinator(store, OPTIONS);

    const batch = await coordinator.applyBatch(3, assigned(1, 2));

    expect(batch.stateHistory).toEqual(["PENDING", "VALIDATED", "FETCHED", "FAILED"]);
    expect(batch.errors).toEqual(["Batch 3: batch write failed: deadlock detected"]);
    expect(batch.updatedCount).toBe(0);
    expect(batch.failedCount).toBe(2);
  });

  it("stops at FETCHED in a dry run", async () => {
    const coordinator = new BatchUpdateCoordinator(store, { ...OPTIONS, dryRun: true });

    const batch = await coordinator.applyBatch(1, assigned(1, 2));

    expect(batch.state).toBe("FETCHED");
    expect(batch.updatedCount).toBe(2);
    expect(store.calls.batchWrite).toBe(0);
    expect(store.get(1)).toMatchObject({ regionCode: "S2", districtCode: "D0009" });
  });
});
