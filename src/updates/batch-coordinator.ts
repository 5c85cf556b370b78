import type { PipelineOptions } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { isSuccessfulAssignment, type SpatialAssignment } from "../models/assignment.js";
import {
  summarizeUpdates,
  type BatchUpdateResult,
  type RollbackResult,
  type SpatialUpdateResult,
} from "../models/results.js";
import type { TargetRecord } from "../models/target-record.js";
import type { RecordStore, RecordUpdate, WriteResult } from "../store/record-store.js";
import { validateAssignments } from "./assignment-validator.js";
import { BatchStateMachine } from "./batch-state.js";

const log = createLogger("coordinator");

export type CoordinatorOptions = Pick<
  PipelineOptions,
  "batchSize" | "validationEnabled" | "rollbackOnPartialFailure" | "rollbackThreshold" | "rollbackStrategy"
> & {
  /** Validate, fetch and merge without writing. Batches end in FETCHED. */
  readonly dryRun?: boolean;
};

interface PreviousCodes {
  readonly regionCode: string | null;
  readonly districtCode: string | null;
}

class BatchTally {
  readonly machine = new BatchStateMachine();
  readonly updated: number[] = [];
  readonly failed: number[] = [];
  readonly errors: string[] = [];
  rollback: RollbackResult | null = null;
  private readonly start = performance.now();

  constructor(readonly batchNumber: number) {}

  fail(objectIds: readonly number[], error: string): void {
    this.failed.push(...objectIds);
    this.errors.push(error);
  }

  result(): BatchUpdateResult {
    return {
      batchNumber: this.batchNumber,
      state: this.machine.state,
      stateHistory: this.machine.stateHistory,
      updatedCount: this.updated.length,
      failedCount: this.failed.length,
      successfulObjectIds: [...this.updated],
      failedObjectIds: [...this.failed],
      errors: [...this.errors],
      updateDurationMs: performance.now() - this.start,
      rollback: this.rollback,
    };
  }
}

/**
 * Writes assignments back batch by batch: one bulk fetch and one batched
 * write per batch. A batch that fails is reported and the next one runs.
 */
export class BatchUpdateCoordinator {
  constructor(
    private readonly store: RecordStore,
    private readonly options: CoordinatorOptions,
  ) {}

  async apply(assignments: readonly SpatialAssignment[]): Promise<SpatialUpdateResult> {
    const batches: BatchUpdateResult[] = [];
    for (let i = 0; i < assignments.length; i += this.options.batchSize) {
      const chunk = assignments.slice(i, i + this.options.batchSize);
      batches.push(await this.applyBatch(batches.length + 1, chunk));
    }
    return summarizeUpdates(batches);
  }

  async applyBatch(batchNumber: number, assignments: readonly SpatialAssignment[]): Promise<BatchUpdateResult> {
    const tally = new BatchTally(batchNumber);
    const allIds = assignments.map((a) => a.objectId);

    if (this.options.validationEnabled) {
      const validation = validateAssignments(assignments);
      if (!validation.ok) {
        tally.machine.transition("FAILED");
        tally.failed.push(...allIds);
        tally.errors.push(...validation.error);
        log.warn("Batch failed validation", { batchNumber, violations: validation.error.length });
        return tally.result();
      }
    }
    tally.machine.transition("VALIDATED");

    const writable: SpatialAssignment[] = [];
    for (const a of assignments) {
      if (isSuccessfulAssignment(a)) writable.push(a);
      else tally.fail([a.objectId], `Record ${a.objectId}: no region or district assigned`);
    }
    if (writable.length === 0) {
      tally.machine.transition("FAILED");
      return tally.result();
    }

    let current: TargetRecord[];
    try {
      current = await this.store.query(
        { kind: "idIn", objectIds: writable.map((a) => a.objectId) },
        { includeGeometry: false },
      );
    } catch (error) {
      tally.machine.transition("FAILED");
      tally.fail(
        writable.map((a) => a.objectId),
        `Batch ${batchNumber}: bulk fetch failed: ${errorMessage(error)}`,
      );
      log.error("Bulk fetch failed", { batchNumber, error: errorMessage(error) });
      return tally.result();
    }
    tally.machine.transition("FETCHED");

    const { updates, previous } = this.merge(writable, current, tally);

    if (this.options.dryRun) {
      tally.updated.push(...updates.map((u) => u.objectId));
      return tally.result();
    }

    if (updates.length === 0) {
      tally.machine.transition("FAILED");
      return tally.result();
    }

    let results: WriteResult[];
    try {
      results = await this.store.batchWrite(updates);
    } catch (error) {
      tally.machine.transition("FAILED");
      tally.fail(
        updates.map((u) => u.objectId),
        `Batch ${batchNumber}: batch write failed: ${errorMessage(error)}`,
      );
      log.error("Batch write failed", { batchNumber, error: errorMessage(error) });
      return tally.result();
    }
    tally.machine.transition("WRITTEN");

    updates.forEach((update, i) => {
      const result = results[i];
      if (result?.success) {
        tally.updated.push(update.objectId);
      } else {
        tally.fail([update.objectId], `Record ${update.objectId}: ${result?.error ?? "no write result returned"}`);
      }
    });

    const successRate = tally.updated.length / assignments.length;
    // Nothing written means nothing to revert.
    if (tally.updated.length > 0 && this.shouldRollBack(tally.failed.length, successRate)) {
      const reason =
        `success rate ${(successRate * 100).toFixed(1)}% ` +
        `below threshold ${(this.options.rollbackThreshold * 100).toFixed(1)}%`;
      const attempted = tally.updated.length;
      const rollback = await this.rollBack(tally.updated, previous);
      if (rollback.rollbackCount === 0) {
        tally.errors.push(`Batch ${batchNumber} rollback failed, no updates reverted (${reason})`);
      } else if (!rollback.success) {
        tally.errors.push(
          `Batch ${batchNumber} partially rolled back: ${rollback.rollbackCount} of ${attempted} updates reverted (${reason})`,
        );
      } else {
        tally.errors.push(`Batch ${batchNumber} rolled back: ${reason}`);
      }
      this.recordRollback(tally, rollback);
      tally.machine.transition(rollback.rollbackCount > 0 ? "ROLLED_BACK" : "COMMITTED");
      log.warn("Batch rollback attempted", {
        batchNumber,
        successRate,
        rolledBack: rollback.rollbackCount,
        rollbackFailures: rollback.failedRollbackCount,
      });
    } else {
      tally.machine.transition("COMMITTED");
    }

    return tally.result();
  }

  shouldRollBack(failedCount: number, successRate: number): boolean {
    return (
      this.options.rollbackOnPartialFailure && failedCount > 0 && successRate < this.options.rollbackThreshold
    );
  }

  /** Only non-null codes overwrite; ids the fetch did not return fail as not found. */
  private merge(
    writable: readonly SpatialAssignment[],
    current: readonly TargetRecord[],
    tally: BatchTally,
  ): { updates: RecordUpdate[]; previous: Map<number, PreviousCodes> } {
    const byId = new Map(current.map((r) => [r.objectId, r]));
    const updates: RecordUpdate[] = [];
    const previous = new Map<number, PreviousCodes>();

    for (const a of writable) {
      const record = byId.get(a.objectId);
      if (record === undefined) {
        tally.fail([a.objectId], `Record ${a.objectId}: not found`);
        continue;
      }
      previous.set(a.objectId, { regionCode: record.regionCode, districtCode: record.districtCode });
      updates.push({
        objectId: a.objectId,
        ...(a.regionCode !== null ? { regionCode: a.regionCode } : {}),
        ...(a.districtCode !== null ? { districtCode: a.districtCode } : {}),
      });
    }
    return { updates, previous };
  }

  /** Single attempt. Records that cannot be reverted are reported, never retried. */
  private async rollBack(
    updatedIds: readonly number[],
    previous: ReadonlyMap<number, PreviousCodes>,
  ): Promise<RollbackResult> {
    const start = performance.now();
    const errors: string[] = [];
    const rolledBack: number[] = [];

    try {
      const records = await this.store.query({ kind: "idIn", objectIds: updatedIds }, { includeGeometry: false });
      const found = new Set(records.map((r) => r.objectId));
      for (const id of updatedIds) {
        if (!found.has(id)) errors.push(`Record ${id}: not found during rollback`);
      }

      const reverts: RecordUpdate[] = records.map((r) => {
        const prior = this.options.rollbackStrategy === "restore-previous" ? previous.get(r.objectId) : undefined;
        return {
          objectId: r.objectId,
          regionCode: prior?.regionCode ?? null,
          districtCode: prior?.districtCode ?? null,
        };
      });
      const results = await this.store.batchWrite(reverts);
      reverts.forEach((revert, i) => {
        const result = results[i];
        if (result?.success) rolledBack.push(revert.objectId);
        else errors.push(`Record ${revert.objectId}: rollback failed: ${result?.error ?? "no write result returned"}`);
      });
    } catch (error) {
      errors.push(`Rollback failed: ${errorMessage(error)}`);
    }

    return {
      success: rolledBack.length === updatedIds.length,
      rollbackCount: rolledBack.length,
      failedRollbackCount: updatedIds.length - rolledBack.length,
      rolledBackObjectIds: rolledBack,
      rollbackDurationMs: performance.now() - start,
      errors,
    };
  }

  /** Reverted ids move from updated to failed so the batch counts still add up. */
  private recordRollback(tally: BatchTally, rollback: RollbackResult): void {
    tally.rollback = rollback;
    tally.errors.push(...rollback.errors);
    const reverted = new Set(rollback.rolledBackObjectIds);
    const stillUpdated = tally.updated.filter((id) => !reverted.has(id));
    tally.updated.splice(0, tally.updated.length, ...stillUpdated);
    tally.failed.push(...reverted);
  }
}
