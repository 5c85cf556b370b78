import type { PipelineOptions } from "./config.js";
import { ChangeDetector } from "./detection/change-detector.js";
import { DatasetUnavailableError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { RunMetadataRecorder } from "./metadata/metadata-recorder.js";
import {
  describeDecision,
  isFullProcessing,
  isProcessingNeeded,
  type ProcessingDecision,
  type ProcessingType,
} from "./models/processing.js";
import { summarizeUpdates, type BatchResult, type BatchUpdateResult } from "./models/results.js";
import { SpatialAssignmentEngine, type ProcessingTarget } from "./spatial/assignment-engine.js";
import { RunContext, type BoundaryHandles } from "./spatial/run-context.js";
import type { MetadataStore, RecordStore } from "./store/record-store.js";
import { schemaProblems, type SchemaCheck } from "./store/schema.js";
import { BatchUpdateCoordinator } from "./updates/batch-coordinator.js";

const log = createLogger("pipeline");

export interface RunOptions {
  /** Detect, assign and merge, but write nothing: no record updates, no metadata. */
  readonly dryRun?: boolean;
  /** Skip change detection and reprocess every record. */
  readonly forceFull?: boolean;
  /** Checked before each batch; an aborted run stops at the next batch boundary. */
  readonly signal?: AbortSignal;
}

export interface RunResult {
  readonly success: boolean;
  readonly processingType: ProcessingType | null;
  readonly decision: ProcessingDecision | null;
  readonly recordsProcessed: number;
  readonly recordsUpdated: number;
  readonly recordsFailed: number;
  readonly rolledBackBatches: number;
  readonly metadataWritten: boolean;
  readonly errors: readonly string[];
  readonly durationMs: number;
  readonly cancelled: boolean;
}

export interface SchemaValidation {
  readonly isValid: boolean;
  readonly checks: readonly SchemaCheck[];
  readonly problems: readonly string[];
}

export interface PipelineDependencies {
  readonly store: RecordStore;
  readonly metadataStore: MetadataStore;
  readonly options: PipelineOptions;
  readonly now?: () => Date;
}

/**
 * One sync run: detect changes, assign codes batch by batch, write each batch
 * back, and record the run if it succeeded. run() never throws.
 *
 * Two runs against the same target dataset must not overlap. Nothing here
 * locks the dataset, and the second run's baseline would race the first.
 */
export class SpatialSyncPipeline {
  private readonly store: RecordStore;
  private readonly metadataStore: MetadataStore;
  private readonly options: PipelineOptions;
  private readonly now: () => Date;
  private readonly detector: ChangeDetector;
  readonly recorder: RunMetadataRecorder;

  constructor(deps: PipelineDependencies) {
    this.store = deps.store;
    this.metadataStore = deps.metadataStore;
    this.options = deps.options;
    this.now = deps.now ?? (() => new Date());
    this.detector = new ChangeDetector(deps.store, deps.metadataStore, deps.options, this.now);
    this.recorder = new RunMetadataRecorder(deps.metadataStore, deps.options, this.now);
  }

  /** Checks that every dataset the run reads or writes exists with the columns it needs. Throws if a check cannot run. */
  async validateSchema(): Promise<SchemaValidation> {
    const checks = [...(await this.store.checkSchema()), await this.metadataStore.checkSchema()];
    const problems = schemaProblems(checks);
    if (problems.length > 0) log.warn("Schema validation failed", { problems });
    return { isValid: problems.length === 0, checks, problems };
  }

  /** Change detection only, with boundary stamps when the boundaries can be read. */
  async detect(): Promise<ProcessingDecision> {
    const context = new RunContext(this.store);
    try {
      let boundaries: BoundaryHandles | null = null;
      try {
        boundaries = await context.openBoundaries();
      } catch (error) {
        log.warn("Boundary datasets unavailable, skipping boundary change check", { error: errorMessage(error) });
      }
      return await this.detector.decide(this.options.targetDatasetId, boundaries);
    } finally {
      context.clear();
    }
  }

  async run(runOptions: RunOptions = {}): Promise<RunResult> {
    const { dryRun = false, forceFull = false, signal } = runOptions;
    const startedAt = this.now();
    const start = performance.now();
    const context = new RunContext(this.store);

    const failed = (message: string, decision: ProcessingDecision | null = null): RunResult => {
      log.error("Run failed", { error: message });
      return {
        success: false,
        processingType: decision?.processingType ?? null,
        decision,
        recordsProcessed: 0,
        recordsUpdated: 0,
        recordsFailed: 0,
        rolledBackBatches: 0,
        metadataWritten: false,
        errors: [message],
        durationMs: performance.now() - start,
        cancelled: false,
      };
    };

    try {
      let schema: SchemaValidation;
      try {
        schema = await this.validateSchema();
      } catch (error) {
        return failed(`Schema check failed: ${errorMessage(error)}`);
      }
      if (!schema.isValid) return failed(`Schema validation failed: ${schema.problems.join("; ")}`);

      let boundaries: BoundaryHandles;
      try {
        boundaries = await context.openBoundaries();
      } catch (error) {
        return failed(`Boundary datasets unavailable: ${errorMessage(error)}`);
      }

      const decision = forceFull
        ? this.forcedDecision()
        : await this.detector.decide(this.options.targetDatasetId, boundaries);
      log.info(`Processing decision: ${describeDecision(decision)}`, { dryRun });

      if (!isProcessingNeeded(decision)) {
        return {
          success: true,
          processingType: decision.processingType,
          decision,
          recordsProcessed: 0,
          recordsUpdated: 0,
          recordsFailed: 0,
          rolledBackBatches: 0,
          metadataWritten: false,
          errors: [],
          durationMs: performance.now() - start,
          cancelled: false,
        };
      }

      const target: ProcessingTarget = isFullProcessing(decision.processingType)
        ? { mode: "all" }
        : { mode: "records", objectIds: decision.targetRecords };
      const engine = new SpatialAssignmentEngine(this.store, context, this.options);
      const coordinator = new BatchUpdateCoordinator(this.store, { ...this.options, dryRun });

      const batchResults: BatchResult[] = [];
      const batchUpdates: BatchUpdateResult[] = [];
      try {
        for await (const { batchResult, assignments } of engine.batches(target, signal)) {
          batchResults.push(batchResult);
          if (assignments.length === 0) continue;
          const update = await coordinator.applyBatch(batchResult.batchNumber, assignments);
          engine.metrics.updateMs += update.updateDurationMs;
          batchUpdates.push(update);
        }
      } catch (error) {
        if (error instanceof DatasetUnavailableError) return failed(error.message, decision);
        throw error;
      }

      const cancelled = engine.cancelled;
      const updates = summarizeUpdates(batchUpdates);
      const unreadable = batchResults.filter((b) => b.fetchFailed).reduce((n, b) => n + b.recordsProcessed, 0);
      const recordsProcessed = batchResults.reduce((n, b) => n + b.recordsProcessed, 0);
      const errors = [...batchResults.flatMap((b) => b.errors), ...updates.errors];
      const durationMs = performance.now() - start;

      const metadata = this.recorder.create({
        decision,
        spatial: { metrics: engine.metrics, assignmentSummary: engine.assignmentSummary(), batchResults },
        updates,
        boundaries,
        startedAt,
        durationMs,
        recordsProcessed,
        recordsUpdated: updates.updatedCount,
        recordsFailed: updates.failedCount + unreadable,
      });
      const metadataWritten = dryRun || cancelled ? false : await this.recorder.writeOnSuccess(metadata);

      const result: RunResult = {
        success: !cancelled,
        processingType: decision.processingType,
        decision,
        recordsProcessed,
        recordsUpdated: metadata.recordsUpdated,
        recordsFailed: metadata.recordsFailed,
        rolledBackBatches: updates.rolledBackBatches,
        metadataWritten,
        errors,
        durationMs,
        cancelled,
      };
      this.logSummary(result, batchUpdates, context);
      return result;
    } catch (error) {
      return failed(`Unexpected error: ${errorMessage(error)}`);
    } finally {
      context.clear();
    }
  }

  private forcedDecision(): ProcessingDecision {
    return {
      processingType: "FORCE_FULL_UPDATE",
      targetRecords: [],
      changeThresholdMet: false,
      fullReprocessRequired: true,
      incrementalFilters: null,
      reasoning: "Full update requested, change detection skipped",
      estimatedProcessingTimeSec: 0,
      configurationUsed: {
        fullReprocessPercentage: this.options.fullReprocessPercentage,
        incrementalThresholdPercentage: this.options.incrementalThresholdPercentage,
        maxIncrementalRecords: this.options.maxIncrementalRecords,
      },
      changeDetection: null,
    };
  }

  private logSummary(result: RunResult, batchUpdates: readonly BatchUpdateResult[], context: RunContext): void {
    log.info("Run complete", {
      processingType: result.processingType,
      recordsProcessed: result.recordsProcessed,
      recordsUpdated: result.recordsUpdated,
      recordsFailed: result.recordsFailed,
      metadataWritten: result.metadataWritten,
      cancelled: result.cancelled,
      durationMs: Math.round(result.durationMs),
      cache: context.getCacheStatistics(),
    });
    for (const batch of batchUpdates) {
      if (batch.rollback === null) continue;
      // Rollback messages start "Batch N " without the colon other batch errors carry.
      const prefix = `Batch ${batch.batchNumber} `;
      const message = batch.errors.find((e) => e.startsWith(prefix)) ?? `${prefix}rollback attempted`;
      log.warn(message, {
        reverted: batch.rollback.rollbackCount,
        failedRollbacks: batch.rollback.failedRollbackCount,
      });
    }
  }
}
