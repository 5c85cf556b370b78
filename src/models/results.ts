import type { AssignmentStatus, ProcessingMethod, SpatialAssignment } from "./assignment.js";

// --- Spatial assignment engine ---

export interface BatchResult {
  readonly batchNumber: number;
  readonly recordsProcessed: number;
  readonly successCount: number;
  readonly errorCount: number;
  readonly processingTimeMs: number;
  readonly errors: readonly string[];
  readonly assignmentSummary: Readonly<Record<AssignmentStatus, number>>;
  /** The page of records could not be read; nothing in it was assigned. */
  readonly fetchFailed: boolean;
}

export interface SpatialMetrics {
  totalLookups: number;
  successfulAssignments: number;
  failedAssignments: number;
  geometryValidationMs: number;
  intersectionMs: number;
  updateMs: number;
  cacheHits: number;
  cacheHitRate: number;
}

export function createSpatialMetrics(): SpatialMetrics {
  return {
    totalLookups: 0,
    successfulAssignments: 0,
    failedAssignments: 0,
    geometryValidationMs: 0,
    intersectionMs: 0,
    updateMs: 0,
    cacheHits: 0,
    cacheHitRate: 0,
  };
}

export function metricsSuccessRate(metrics: SpatialMetrics): number {
  const total = metrics.successfulAssignments + metrics.failedAssignments;
  return total === 0 ? 0 : metrics.successfulAssignments / total;
}

export function totalProcessingMs(metrics: SpatialMetrics): number {
  return metrics.geometryValidationMs + metrics.intersectionMs + metrics.updateMs;
}

export interface AssignmentSummary {
  readonly byStatus: Readonly<Record<AssignmentStatus, number>>;
  readonly byMethod: Readonly<Partial<Record<ProcessingMethod, number>>>;
  readonly regionAssigned: number;
  readonly districtAssigned: number;
  readonly averageQuality: number;
}

export interface SpatialProcessingResult {
  readonly assignments: readonly SpatialAssignment[];
  readonly batchResults: readonly BatchResult[];
  readonly metrics: SpatialMetrics;
  readonly processedCount: number;
  readonly processingDurationMs: number;
  readonly assignmentSummary: AssignmentSummary;
}

// --- Batch update coordinator ---

export type BatchState =
  | "PENDING"
  | "VALIDATED"
  | "FETCHED"
  | "WRITTEN"
  | "COMMITTED"
  | "ROLLED_BACK"
  | "FAILED";

export interface RollbackResult {
  readonly success: boolean;
  readonly rollbackCount: number;
  readonly failedRollbackCount: number;
  readonly rolledBackObjectIds: readonly number[];
  readonly rollbackDurationMs: number;
  readonly errors: readonly string[];
}

export interface BatchUpdateResult {
  readonly batchNumber: number;
  readonly state: BatchState;
  readonly stateHistory: readonly BatchState[];
  readonly updatedCount: number;
  readonly failedCount: number;
  readonly successfulObjectIds: readonly number[];
  readonly failedObjectIds: readonly number[];
  readonly errors: readonly string[];
  readonly updateDurationMs: number;
  readonly rollback: RollbackResult | null;
}

export interface SpatialUpdateResult {
  readonly updatedCount: number;
  readonly failedCount: number;
  readonly updateDurationMs: number;
  readonly errors: readonly string[];
  readonly batchUpdates: readonly BatchUpdateResult[];
  readonly rolledBackBatches: number;
}

export function updateSuccessRate(result: SpatialUpdateResult): number {
  const total = result.updatedCount + result.failedCount;
  return total === 0 ? 0 : result.updatedCount / total;
}

export function summarizeUpdates(batches: readonly BatchUpdateResult[]): SpatialUpdateResult {
  let updatedCount = 0;
  let failedCount = 0;
  let updateDurationMs = 0;
  let rolledBackBatches = 0;
  const errors: string[] = [];
  for (const batch of batches) {
    updatedCount += batch.updatedCount;
    failedCount += batch.failedCount;
    updateDurationMs += batch.updateDurationMs;
    if (batch.state === "ROLLED_BACK") rolledBackBatches++;
    errors.push(...batch.errors);
  }
  return { updatedCount, failedCount, updateDurationMs, errors, batchUpdates: batches, rolledBackBatches };
}
