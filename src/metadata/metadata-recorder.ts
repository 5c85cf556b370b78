import { randomUUID } from "node:crypto";
import type { PipelineOptions } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  metadataSuccessRate,
  type MetadataValidation,
  type ProcessMetadata,
} from "../models/metadata.js";
import type { ProcessingDecision } from "../models/processing.js";
import {
  metricsSuccessRate,
  totalProcessingMs,
  updateSuccessRate,
  type SpatialProcessingResult,
  type SpatialUpdateResult,
} from "../models/results.js";
import type { BoundaryHandles } from "../spatial/run-context.js";
import type { MetadataStore } from "../store/record-store.js";

const log = createLogger("metadata");

/** How far ahead of the local clock a process timestamp may be. */
export const FUTURE_TOLERANCE_MS = 60_000;
const DAY_MS = 24 * 60 * 60 * 1000;

export type PerformanceRating = "Excellent" | "Good" | "Fair" | "Poor";

export type RecorderOptions = Pick<
  PipelineOptions,
  | "processName"
  | "environment"
  | "targetDatasetId"
  | "regionDatasetId"
  | "districtDatasetId"
  | "metadataSuccessThreshold"
  | "metadataRetentionDays"
>;

export interface RunSummary {
  readonly decision: ProcessingDecision;
  readonly spatial: Pick<SpatialProcessingResult, "metrics" | "assignmentSummary" | "batchResults">;
  readonly updates: SpatialUpdateResult;
  readonly boundaries: BoundaryHandles | null;
  readonly startedAt: Date;
  readonly durationMs: number;
  readonly recordsProcessed: number;
  readonly recordsUpdated: number;
  readonly recordsFailed: number;
  /** Set when the run itself failed; the metadata is then recorded with status Error. */
  readonly fatalError?: string | null;
}

export function categorizeErrors(errors: readonly string[]): Record<string, number> {
  const patterns: Record<string, number> = {};
  for (const error of errors) {
    const e = error.toLowerCase();
    let category = "other_errors";
    if (e.includes("permission") || e.includes("access")) category = "permission_errors";
    else if (e.includes("network") || e.includes("connection") || e.includes("timeout")) {
      category = "connectivity_errors";
    } else if (e.includes("validation") || e.includes("invalid")) category = "validation_errors";
    else if (e.includes("update") || e.includes("edit") || e.includes("write")) category = "update_errors";
    patterns[category] = (patterns[category] ?? 0) + 1;
  }
  return patterns;
}

export function performanceRating(recordsPerSecond: number): PerformanceRating {
  if (recordsPerSecond > 100) return "Excellent";
  if (recordsPerSecond > 50) return "Good";
  if (recordsPerSecond > 25) return "Fair";
  return "Poor";
}

export function validateMetadata(metadata: ProcessMetadata, now: Date = new Date()): MetadataValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const m = metadata;

  for (const [field, value] of [
    ["recordsProcessed", m.recordsProcessed],
    ["recordsUpdated", m.recordsUpdated],
    ["recordsFailed", m.recordsFailed],
  ] as const) {
    if (value < 0) errors.push(`${field} cannot be negative (${value})`);
  }
  if (m.recordsUpdated > m.recordsProcessed) {
    errors.push(`recordsUpdated (${m.recordsUpdated}) exceeds recordsProcessed (${m.recordsProcessed})`);
  }
  if (m.processingDurationMs < 0) errors.push(`processingDurationMs cannot be negative (${m.processingDurationMs})`);
  if (m.processTimestamp.getTime() > now.getTime() + FUTURE_TOLERANCE_MS) {
    errors.push(`processTimestamp ${m.processTimestamp.toISOString()} is in the future`);
  }
  if (m.processStatus === "Error" && !m.errorMessage) errors.push("Error status requires an error message");
  if (m.processStatus === "Success" && m.errorMessage !== null) {
    errors.push("Success status must not carry an error message");
  }
  for (const [field, value] of [
    ["processName", m.processName],
    ["targetDatasetId", m.targetDatasetId],
    ["regionDatasetId", m.regionDatasetId],
    ["districtDatasetId", m.districtDatasetId],
  ] as const) {
    if (value.trim() === "") errors.push(`${field} must not be empty`);
  }

  if (m.recordsUpdated + m.recordsFailed !== m.recordsProcessed) {
    warnings.push(
      `recordsUpdated + recordsFailed (${m.recordsUpdated + m.recordsFailed}) differs from recordsProcessed (${m.recordsProcessed})`,
    );
  }
  if (m.recordsProcessed === 0) warnings.push("No records processed");

  return { isValid: errors.length === 0, errors, warnings };
}

/**
 * Builds a ProcessMetadata row for each run and persists it only when the run
 * cleared the success threshold. The latest persisted row is the next run's
 * change detection baseline.
 */
export class RunMetadataRecorder {
  constructor(
    private readonly store: MetadataStore,
    private readonly options: RecorderOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  create(run: RunSummary): ProcessMetadata {
    const fatalError = run.fatalError ?? null;
    const seconds = run.durationMs / 1000;
    const recordsPerSecond = seconds > 0 ? run.recordsProcessed / seconds : 0;
    const allErrors = [
      ...run.spatial.batchResults.flatMap((b) => b.errors),
      ...run.updates.errors,
      ...(fatalError === null ? [] : [fatalError]),
    ];

    return {
      processingId: randomUUID(),
      processName: this.options.processName,
      environment: this.options.environment,
      processTimestamp: run.startedAt,
      processingType: run.decision.processingType,
      targetDatasetId: this.options.targetDatasetId,
      regionDatasetId: this.options.regionDatasetId,
      regionDatasetUpdated: run.boundaries?.region.lastModified ?? null,
      districtDatasetId: this.options.districtDatasetId,
      districtDatasetUpdated: run.boundaries?.district.lastModified ?? null,
      processStatus: fatalError === null ? "Success" : "Error",
      recordsProcessed: run.recordsProcessed,
      recordsUpdated: run.recordsUpdated,
      recordsFailed: run.recordsFailed,
      processingDurationMs: Math.round(run.durationMs),
      errorMessage: fatalError,
      metadataDetails: {
        decision: {
          processingType: run.decision.processingType,
          reasoning: run.decision.reasoning,
          targetRecordCount: run.decision.targetRecords.length,
          changePercentage: run.decision.changeDetection?.changePercentage ?? null,
          configurationUsed: run.decision.configurationUsed,
        },
        errorPatterns: categorizeErrors(allErrors),
        assignmentSummary: run.spatial.assignmentSummary,
        cacheHitRate: Math.round(run.spatial.metrics.cacheHitRate * 1000) / 1000,
        assignmentSuccessRate: Math.round(metricsSuccessRate(run.spatial.metrics) * 1000) / 1000,
        writeSuccessRate: Math.round(updateSuccessRate(run.updates) * 1000) / 1000,
        stageDurationMs: Math.round(totalProcessingMs(run.spatial.metrics)),
        recordsPerSecond: Math.round(recordsPerSecond * 10) / 10,
        performanceRating: performanceRating(recordsPerSecond),
        rolledBackBatches: run.updates.rolledBackBatches,
        optimizationNotes: this.optimizationNotes(run),
      },
    };
  }

  /** Returns true only if the row was persisted. Never throws. */
  async writeOnSuccess(
    metadata: ProcessMetadata,
    threshold: number = this.options.metadataSuccessThreshold,
  ): Promise<boolean> {
    if (metadata.recordsProcessed === 0) {
      log.info("No records processed, metadata not written");
      return false;
    }

    const rate = metadataSuccessRate(metadata);
    if (rate < threshold) {
      log.warn("Success rate below threshold, metadata not written so the baseline stays put", {
        successRate: Math.round(rate * 1000) / 1000,
        threshold,
        recordsProcessed: metadata.recordsProcessed,
        recordsUpdated: metadata.recordsUpdated,
      });
      return false;
    }

    const validation = validateMetadata(metadata, this.now());
    for (const warning of validation.warnings) log.warn(`Metadata warning: ${warning}`);
    if (!validation.isValid) {
      log.error("Metadata failed validation, not written", { errors: validation.errors });
      return false;
    }

    try {
      await this.store.write(metadata);
    } catch (error) {
      log.error("Failed to write process metadata", { error: errorMessage(error) });
      return false;
    }
    log.info("Process metadata written", { processingId: metadata.processingId, successRate: rate });
    return true;
  }

  async latestSuccessful(): Promise<ProcessMetadata | null> {
    return this.store.readLatest(this.options.processName, this.options.environment, { status: "Success" });
  }

  async history(days = 30): Promise<ProcessMetadata[]> {
    const since = new Date(this.now().getTime() - days * DAY_MS);
    return this.store.history(this.options.processName, this.options.environment, since);
  }

  async prune(retentionDays: number = this.options.metadataRetentionDays): Promise<number> {
    const cutoff = new Date(this.now().getTime() - retentionDays * DAY_MS);
    const deleted = await this.store.prune(this.options.processName, this.options.environment, cutoff);
    log.info("Pruned process metadata", { deleted, cutoff: cutoff.toISOString() });
    return deleted;
  }

  private optimizationNotes(run: RunSummary): string[] {
    const notes: string[] = [];
    const batches = run.updates.batchUpdates.length;
    if (batches > 0) {
      const attempted = run.updates.updatedCount + run.updates.failedCount;
      const reduction = Math.round(attempted / batches);
      notes.push(`Batch writes achieved ${reduction}x query reduction vs per-record updates`);
    }

    const rate = run.spatial.metrics.cacheHitRate;
    const pct = `${(rate * 100).toFixed(1)}%`;
    if (rate > 0.8) notes.push(`Excellent cache hit rate: ${pct}`);
    else if (rate > 0.5) notes.push(`Good cache hit rate: ${pct}`);
    else notes.push(`Low cache hit rate: ${pct}`);
    return notes;
  }
}
