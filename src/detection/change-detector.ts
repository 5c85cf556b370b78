/**
 * Change Detector
 *
 * Compares the target dataset against the baseline left by the last
 * successful run and decides between full, incremental or no processing.
 * Detection never throws: any failure becomes FORCE_FULL_UPDATE so a broken
 * read can only cost time, never skip edited records.
 */

import type { PipelineOptions } from "../config.js";
import { errorMessage, errorName } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ProcessMetadata } from "../models/metadata.js";
import {
  normalizeTargetRecords,
  type ChangeDetectionResult,
  type DetectionThresholds,
  type ProcessingDecision,
  type ProcessingType,
} from "../models/processing.js";
import {
  ALL_RECORDS,
  describePredicate,
  type MetadataStore,
  type RecordPredicate,
  type RecordStore,
} from "../store/record-store.js";
import type { BoundaryHandles } from "../spatial/run-context.js";

const log = createLogger("change-detector");

const EDIT_FIELD = "edit_timestamp";
const MODIFIED_ID_SAMPLE_SIZE = 100;
const FULL_SECONDS_PER_RECORD = 0.1;
const INCREMENTAL_SECONDS_PER_RECORD = 0.2;

export type ChangeDetectorOptions = Pick<
  PipelineOptions,
  | "fullReprocessPercentage"
  | "incrementalThresholdPercentage"
  | "maxIncrementalRecords"
  | "reprocessOnBoundaryChange"
  | "processName"
  | "environment"
>;

interface Detection {
  readonly result: ChangeDetectionResult;
  readonly modifiedIds: readonly number[];
  readonly failure: unknown;
}

export function roundPercentage(value: number): number {
  const clamped = Math.min(100, Math.max(0, value));
  return Math.round(clamped * 100) / 100;
}

function estimateSeconds(records: number, perRecord: number): number {
  return Math.round(records * perRecord * 10) / 10;
}

export class ChangeDetector {
  private readonly thresholds: DetectionThresholds;

  constructor(
    private readonly store: RecordStore,
    private readonly metadata: MetadataStore,
    private readonly options: ChangeDetectorOptions,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.thresholds = {
      fullReprocessPercentage: options.fullReprocessPercentage,
      incrementalThresholdPercentage: options.incrementalThresholdPercentage,
      maxIncrementalRecords: options.maxIncrementalRecords,
    };
  }

  /**
   * Decide how much of the dataset this run must reprocess. Pass the run's
   * boundary handles to reprocess everything when a boundary dataset changed
   * after the baseline run.
   */
  async decide(datasetId: string, boundaries: BoundaryHandles | null = null): Promise<ProcessingDecision> {
    let baseline: ProcessMetadata | null;
    try {
      baseline = await this.metadata.readLatest(this.options.processName, this.options.environment, {
        status: "Success",
      });
    } catch (error) {
      return this.forceFull(error, 0);
    }

    if (baseline === null) {
      log.info("No successful baseline run found, full reprocessing required", { datasetId });
      return {
        processingType: "FULL_REPROCESSING",
        targetRecords: [],
        changeThresholdMet: true,
        fullReprocessRequired: true,
        incrementalFilters: null,
        reasoning: "No previous successful run found; initial processing requires full reprocessing",
        estimatedProcessingTimeSec: 0,
        configurationUsed: this.thresholds,
        changeDetection: null,
      };
    }

    const { result, modifiedIds, failure } = await this.detect(datasetId, baseline.processTimestamp);
    if (failure !== null) return this.forceFull(failure, result.totalRecords);

    const decision = this.fromDetection(result, modifiedIds);
    const boundaryChange = boundaries === null ? null : this.boundaryChange(baseline, boundaries);
    if (boundaryChange === null || decision.processingType === "FULL_REPROCESSING") return decision;

    log.info("Boundary dataset changed since baseline, reprocessing all records", { datasetId, boundaryChange });
    return {
      ...decision,
      processingType: "FULL_REPROCESSING",
      targetRecords: [],
      fullReprocessRequired: true,
      incrementalFilters: null,
      reasoning: `${boundaryChange}; cached assignments may be stale, reprocessing all records`,
      estimatedProcessingTimeSec: estimateSeconds(result.totalRecords, FULL_SECONDS_PER_RECORD),
    };
  }

  async detectChanges(datasetId: string, since: Date): Promise<ChangeDetectionResult> {
    const { result } = await this.detect(datasetId, since);
    return result;
  }

  private async detect(datasetId: string, since: Date): Promise<Detection> {
    const start = performance.now();
    const detectionTimestamp = this.now();
    let totalRecords = 0;

    try {
      const modifiedPredicate: RecordPredicate = { kind: "editedSince", since };
      totalRecords = await this.store.count(ALL_RECORDS);
      const modifiedRecords = await this.store.count(modifiedPredicate);
      const created = await this.countNewRecords(datasetId, since);

      const changePercentage = roundPercentage(totalRecords === 0 ? 0 : (modifiedRecords / totalRecords) * 100);
      const processingRecommendation = this.recommend(modifiedRecords, changePercentage);

      let modifiedIds: number[] = [];
      if (modifiedRecords > 0 && modifiedRecords <= this.thresholds.maxIncrementalRecords) {
        const records = await this.store.query(modifiedPredicate, {
          includeGeometry: false,
          limit: this.thresholds.maxIncrementalRecords,
        });
        modifiedIds = records.map((r) => r.objectId);
      }

      log.debug("Change detection complete", { datasetId, totalRecords, modifiedRecords, changePercentage });
      return {
        result: {
          datasetId,
          detectionTimestamp,
          sinceTimestamp: since,
          totalRecords,
          modifiedRecords,
          newRecords: created.count,
          changePercentage,
          processingRecommendation,
          changeDetails: {
            modifiedObjectIdsSample: modifiedIds.slice(0, MODIFIED_ID_SAMPLE_SIZE),
            editField: EDIT_FIELD,
            detectionMethod: "edit_timestamp_comparison",
            ...(created.error === null ? {} : { newRecordsError: created.error }),
          },
          detectionDurationMs: performance.now() - start,
        },
        modifiedIds,
        failure: null,
      };
    } catch (error) {
      log.error("Change detection failed", { datasetId, error: errorMessage(error) });
      return {
        result: {
          datasetId,
          detectionTimestamp,
          sinceTimestamp: since,
          totalRecords,
          modifiedRecords: 0,
          newRecords: null,
          changePercentage: 0,
          processingRecommendation: "FORCE_FULL_UPDATE",
          changeDetails: { detectionFailed: true, error: errorMessage(error), errorType: errorName(error) },
          detectionDurationMs: performance.now() - start,
        },
        modifiedIds: [],
        failure: error,
      };
    }
  }

  /** Diagnostic only: a failure here (no created_at column, say) never changes the decision. */
  private async countNewRecords(
    datasetId: string,
    since: Date,
  ): Promise<{ count: number | null; error: string | null }> {
    try {
      return { count: await this.store.count({ kind: "createdSince", since }), error: null };
    } catch (error) {
      log.warn("New record count unavailable", { datasetId, error: errorMessage(error) });
      return { count: null, error: errorMessage(error) };
    }
  }

  private recommend(modifiedRecords: number, changePercentage: number): ProcessingType {
    const t = this.thresholds;
    if (modifiedRecords === 0) return "NO_PROCESSING_NEEDED";
    if (changePercentage >= t.fullReprocessPercentage) return "FULL_REPROCESSING";
    if (modifiedRecords > t.maxIncrementalRecords) return "FULL_REPROCESSING";
    if (changePercentage >= t.incrementalThresholdPercentage) return "INCREMENTAL_UPDATE";
    return "NO_PROCESSING_NEEDED";
  }

  private fromDetection(result: ChangeDetectionResult, modifiedIds: readonly number[]): ProcessingDecision {
    const t = this.thresholds;
    const pct = result.changePercentage;
    const base = {
      changeThresholdMet: pct >= t.incrementalThresholdPercentage,
      configurationUsed: t,
      changeDetection: result,
    };

    switch (result.processingRecommendation) {
      case "INCREMENTAL_UPDATE": {
        const predicate: RecordPredicate = { kind: "editedSince", since: result.sinceTimestamp };
        return {
          ...base,
          processingType: "INCREMENTAL_UPDATE",
          targetRecords: normalizeTargetRecords(modifiedIds.slice(0, t.maxIncrementalRecords)),
          fullReprocessRequired: false,
          incrementalFilters: {
            predicate,
            whereClause: describePredicate(predicate),
            modifiedCount: result.modifiedRecords,
            sinceTimestamp: result.sinceTimestamp.toISOString(),
          },
          reasoning: `${result.modifiedRecords} records modified (${pct}%), processing incrementally`,
          estimatedProcessingTimeSec: estimateSeconds(result.modifiedRecords, INCREMENTAL_SECONDS_PER_RECORD),
        };
      }
      case "FULL_REPROCESSING":
      case "FORCE_FULL_UPDATE": {
        const reasoning =
          pct >= t.fullReprocessPercentage
            ? `Change percentage ${pct}% >= full reprocess threshold ${t.fullReprocessPercentage}%`
            : `${result.modifiedRecords} modified records exceed incremental limit of ${t.maxIncrementalRecords}`;
        return {
          ...base,
          processingType: result.processingRecommendation,
          targetRecords: [],
          fullReprocessRequired: true,
          incrementalFilters: null,
          reasoning,
          estimatedProcessingTimeSec: estimateSeconds(result.totalRecords, FULL_SECONDS_PER_RECORD),
        };
      }
      case "NO_PROCESSING_NEEDED":
        return {
          ...base,
          processingType: "NO_PROCESSING_NEEDED",
          targetRecords: [],
          fullReprocessRequired: false,
          incrementalFilters: null,
          reasoning:
            result.modifiedRecords === 0
              ? `No records modified since ${result.sinceTimestamp.toISOString()}`
              : `Change percentage ${pct}% below incremental threshold ${t.incrementalThresholdPercentage}%`,
          estimatedProcessingTimeSec: 0,
        };
    }
  }

  private boundaryChange(baseline: ProcessMetadata, boundaries: BoundaryHandles): string | null {
    if (!this.options.reprocessOnBoundaryChange) return null;
    const checks = [
      { handle: boundaries.region, recorded: baseline.regionDatasetUpdated },
      { handle: boundaries.district, recorded: baseline.districtDatasetUpdated },
    ];
    for (const { handle, recorded } of checks) {
      const current = handle.lastModified;
      if (current !== null && (recorded === null || current > recorded)) {
        return `Boundary dataset ${handle.datasetId} updated at ${current.toISOString()}`;
      }
    }
    return null;
  }

  private forceFull(error: unknown, totalRecords: number): ProcessingDecision {
    return {
      processingType: "FORCE_FULL_UPDATE",
      targetRecords: [],
      changeThresholdMet: false,
      fullReprocessRequired: true,
      incrementalFilters: null,
      reasoning: `Change detection failed (${errorMessage(error)}); forcing full update`,
      estimatedProcessingTimeSec: estimateSeconds(totalRecords, FULL_SECONDS_PER_RECORD),
      configurationUsed: this.thresholds,
      changeDetection: null,
    };
  }
}
