import type { Geometry } from "geojson";
import { DatasetUnavailableError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  calculateIntersectionQuality,
  emptyStatusTally,
  getAssignmentStatus,
  isSuccessfulAssignment,
  type AssignmentStatus,
  type ProcessingMethod,
  type SpatialAssignment,
} from "../models/assignment.js";
import {
  createSpatialMetrics,
  type AssignmentSummary,
  type BatchResult,
  type SpatialMetrics,
  type SpatialProcessingResult,
} from "../models/results.js";
import type { TargetRecord } from "../models/target-record.js";
import { err, ok, type Outcome } from "../outcome.js";
import { ALL_RECORDS, type BoundaryHandle, type RecordStore } from "../store/record-store.js";
import { geometryCacheKey, validateGeometry } from "./geometry.js";
import type { CacheStatistics, RunContext } from "./run-context.js";

const log = createLogger("engine");

export type ProcessingTarget =
  | { readonly mode: "all" }
  | { readonly mode: "records"; readonly objectIds: readonly number[] };

export interface EngineBatch {
  readonly batchResult: BatchResult;
  readonly assignments: readonly SpatialAssignment[];
}

export interface EngineOptions {
  readonly batchSize: number;
  readonly targetDatasetId: string;
}

interface RecordOutcome {
  readonly assignment: SpatialAssignment;
  readonly errors: readonly string[];
}

interface PageRequest {
  readonly batchNumber: number;
  readonly expected: number;
  readonly read: () => Promise<TargetRecord[]>;
}

/** Running counts behind an AssignmentSummary. */
export class AssignmentTally {
  private readonly byStatus = emptyStatusTally();
  private readonly byMethod: Partial<Record<ProcessingMethod, number>> = {};
  private regionAssigned = 0;
  private districtAssigned = 0;
  private qualityTotal = 0;
  private count = 0;

  add(assignment: SpatialAssignment): void {
    this.byStatus[getAssignmentStatus(assignment)]++;
    this.byMethod[assignment.processingMethod] = (this.byMethod[assignment.processingMethod] ?? 0) + 1;
    if (assignment.regionCode !== null) this.regionAssigned++;
    if (assignment.districtCode !== null) this.districtAssigned++;
    this.qualityTotal += assignment.intersectionQuality;
    this.count++;
  }

  summary(): AssignmentSummary {
    return {
      byStatus: { ...this.byStatus },
      byMethod: { ...this.byMethod },
      regionAssigned: this.regionAssigned,
      districtAssigned: this.districtAssigned,
      averageQuality: this.count === 0 ? 0 : Math.round((this.qualityTotal / this.count) * 1000) / 1000,
    };
  }
}

export function summarizeAssignments(assignments: readonly SpatialAssignment[]): AssignmentSummary {
  const tally = new AssignmentTally();
  for (const a of assignments) tally.add(a);
  return tally.summary();
}

/**
 * Resolves region and district codes for target records, batch by batch.
 * Boundary handles and the assignment cache live in the RunContext.
 */
export class SpatialAssignmentEngine {
  readonly metrics: SpatialMetrics = createSpatialMetrics();
  private readonly tally = new AssignmentTally();
  private stoppedEarly = false;

  constructor(
    private readonly store: RecordStore,
    private readonly context: RunContext,
    private readonly options: EngineOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1 || options.batchSize > 5000) {
      throw new RangeError(`Batch size must be an integer between 1 and 5000, got ${options.batchSize}`);
    }
  }

  async process(target: ProcessingTarget, signal?: AbortSignal): Promise<SpatialProcessingResult> {
    const start = performance.now();
    const assignments: SpatialAssignment[] = [];
    const batchResults: BatchResult[] = [];

    for await (const batch of this.batches(target, signal)) {
      assignments.push(...batch.assignments);
      batchResults.push(batch.batchResult);
    }

    return {
      assignments,
      batchResults,
      metrics: this.metrics,
      processedCount: assignments.length,
      processingDurationMs: performance.now() - start,
      assignmentSummary: this.tally.summary(),
    };
  }

  /**
   * Yields one batch at a time so callers can write each back before the next
   * is read. A failed first read throws DatasetUnavailableError; later read
   * failures yield a batch marked fetchFailed.
   */
  async *batches(target: ProcessingTarget, signal?: AbortSignal): AsyncGenerator<EngineBatch> {
    const handles = await this.context.openBoundaries();

    for await (const page of this.pages(target)) {
      if (signal?.aborted) {
        this.stoppedEarly = true;
        log.info("Cancellation requested, stopping before next batch", { batchNumber: page.batchNumber });
        return;
      }

      let records: TargetRecord[];
      try {
        records = await page.read();
      } catch (error) {
        if (page.batchNumber === 1) throw new DatasetUnavailableError(this.options.targetDatasetId, error);
        log.error("Failed to read batch", { batchNumber: page.batchNumber, error: errorMessage(error) });
        yield { batchResult: this.fetchFailedBatch(page, error), assignments: [] };
        continue;
      }

      yield await this.processBatch(page.batchNumber, records, handles.region, handles.district);
    }
  }

  async processRecord(
    record: TargetRecord,
    region: BoundaryHandle,
    district: BoundaryHandle,
  ): Promise<RecordOutcome> {
    const start = performance.now();
    const m = this.metrics;

    const validationStart = performance.now();
    const geometry = record.geometry;
    const geometryValid = validateGeometry(geometry);
    m.geometryValidationMs += performance.now() - validationStart;

    if (!geometryValid || geometry === null) {
      return {
        assignment: {
          objectId: record.objectId,
          regionCode: null,
          districtCode: null,
          intersectionQuality: 0,
          processingMethod: "GEOMETRY_REPAIR",
          geometryValid: false,
          processingDurationMs: performance.now() - start,
        },
        errors: [],
      };
    }

    const key = geometryCacheKey(geometry);
    const cached = key === null ? undefined : this.context.lookup(key);
    if (cached !== undefined) {
      m.cacheHits++;
      return {
        assignment: {
          ...cached,
          objectId: record.objectId,
          processingMethod: "CACHED_INTERSECTION",
          processingDurationMs: performance.now() - start,
        },
        errors: [],
      };
    }

    const intersectionStart = performance.now();
    const regionLookup = await this.lookup(region, geometry);
    const districtLookup = await this.lookup(district, geometry);
    m.intersectionMs += performance.now() - intersectionStart;
    m.totalLookups += 2;

    const errors: string[] = [];
    if (!regionLookup.ok) errors.push(`Record ${record.objectId}: region lookup failed: ${regionLookup.error}`);
    if (!districtLookup.ok) errors.push(`Record ${record.objectId}: district lookup failed: ${districtLookup.error}`);

    const regionCode = regionLookup.ok ? regionLookup.value : null;
    const districtCode = districtLookup.ok ? districtLookup.value : null;
    const assignment: SpatialAssignment = {
      objectId: record.objectId,
      regionCode,
      districtCode,
      intersectionQuality: calculateIntersectionQuality(regionCode, districtCode),
      processingMethod: regionCode === null && districtCode === null ? "FALLBACK_ASSIGNMENT" : "FULL_INTERSECTION",
      geometryValid: true,
      processingDurationMs: performance.now() - start,
    };

    // A failed lookup is not an answer; keep it out of the cache.
    if (key !== null && errors.length === 0) this.context.remember(key, assignment);
    return { assignment, errors };
  }

  private async processBatch(
    batchNumber: number,
    records: readonly TargetRecord[],
    region: BoundaryHandle,
    district: BoundaryHandle,
  ): Promise<EngineBatch> {
    const start = performance.now();
    const assignments: SpatialAssignment[] = [];
    const errors: string[] = [];
    const summary: Record<AssignmentStatus, number> = emptyStatusTally();
    let successCount = 0;
    let errorCount = 0;

    for (const record of records) {
      const outcome = await this.processRecord(record, region, district);
      assignments.push(outcome.assignment);
      summary[getAssignmentStatus(outcome.assignment)]++;
      this.tally.add(outcome.assignment);

      if (isSuccessfulAssignment(outcome.assignment)) {
        successCount++;
        this.metrics.successfulAssignments++;
      } else {
        this.metrics.failedAssignments++;
      }
      if (outcome.errors.length > 0) {
        errorCount++;
        errors.push(...outcome.errors);
      }
    }

    const total = this.metrics.successfulAssignments + this.metrics.failedAssignments;
    this.metrics.cacheHitRate = total === 0 ? 0 : this.metrics.cacheHits / total;

    const batchResult: BatchResult = {
      batchNumber,
      recordsProcessed: records.length,
      successCount,
      errorCount,
      processingTimeMs: performance.now() - start,
      errors,
      assignmentSummary: summary,
      fetchFailed: false,
    };
    log.debug("Batch assigned", {
      batchNumber,
      records: records.length,
      successCount,
      errorCount,
      cacheHits: this.metrics.cacheHits,
    });
    return { batchResult, assignments };
  }

  private async lookup(boundary: BoundaryHandle, geometry: Geometry): Promise<Outcome<string | null>> {
    try {
      const matches = await this.store.spatialQuery(boundary, geometry);
      return ok(matches[0]?.code ?? null);
    } catch (error) {
      return err(errorMessage(error));
    }
  }

  /** Every record in the unreadable page counts as processed and failed. */
  private fetchFailedBatch(page: PageRequest, error: unknown): BatchResult {
    return {
      batchNumber: page.batchNumber,
      recordsProcessed: page.expected,
      successCount: 0,
      errorCount: page.expected,
      processingTimeMs: 0,
      errors: [`Batch ${page.batchNumber}: failed to read records: ${errorMessage(error)}`],
      assignmentSummary: emptyStatusTally(),
      fetchFailed: true,
    };
  }

  private async *pages(target: ProcessingTarget): AsyncGenerator<PageRequest> {
    const { batchSize } = this.options;

    if (target.mode === "records") {
      for (let i = 0; i < target.objectIds.length; i += batchSize) {
        const objectIds = target.objectIds.slice(i, i + batchSize);
        yield {
          batchNumber: i / batchSize + 1,
          expected: objectIds.length,
          read: () => this.store.query({ kind: "idIn", objectIds }, { includeGeometry: true }),
        };
      }
      return;
    }

    let total: number;
    try {
      total = await this.store.count(ALL_RECORDS);
    } catch (error) {
      throw new DatasetUnavailableError(this.options.targetDatasetId, error);
    }
    log.info("Processing all records", { total, batchSize });

    for (let offset = 0; offset < total; offset += batchSize) {
      yield {
        batchNumber: offset / batchSize + 1,
        expected: Math.min(batchSize, total - offset),
        read: () => this.store.query(ALL_RECORDS, { includeGeometry: true, offset, limit: batchSize }),
      };
    }
  }

  /** True once a batches() run stopped at a batch boundary because its signal was aborted. */
  get cancelled(): boolean {
    return this.stoppedEarly;
  }

  /** Summary of every assignment this engine produced so far. */
  assignmentSummary(): AssignmentSummary {
    return this.tally.summary();
  }

  getCacheStatistics(): CacheStatistics {
    return this.context.getCacheStatistics();
  }
}
