import type { RecordPredicate } from "../store/record-store.js";

export type ProcessingType =
  | "FULL_REPROCESSING"
  | "INCREMENTAL_UPDATE"
  | "NO_PROCESSING_NEEDED"
  | "FORCE_FULL_UPDATE";

export interface ChangeDetectionResult {
  readonly datasetId: string;
  readonly detectionTimestamp: Date;
  readonly sinceTimestamp: Date;
  readonly totalRecords: number;
  readonly modifiedRecords: number;
  /** Records created after the baseline, null when they could not be counted. Never drives the decision. */
  readonly newRecords: number | null;
  readonly changePercentage: number;
  readonly processingRecommendation: ProcessingType;
  readonly changeDetails: Readonly<Record<string, unknown>>;
  readonly detectionDurationMs: number;
}

export interface IncrementalFilters {
  readonly predicate: RecordPredicate;
  readonly whereClause: string;
  readonly modifiedCount: number;
  /** ISO-8601 baseline the filter selects edits after. */
  readonly sinceTimestamp: string;
}

export interface DetectionThresholds {
  readonly fullReprocessPercentage: number;
  readonly incrementalThresholdPercentage: number;
  readonly maxIncrementalRecords: number;
}

export interface ProcessingDecision {
  readonly processingType: ProcessingType;
  readonly targetRecords: readonly number[];
  readonly changeThresholdMet: boolean;
  readonly fullReprocessRequired: boolean;
  readonly incrementalFilters: IncrementalFilters | null;
  readonly reasoning: string;
  readonly estimatedProcessingTimeSec: number;
  readonly configurationUsed: DetectionThresholds;
  readonly changeDetection: ChangeDetectionResult | null;
}

/** Upper bound on the id list an incremental decision may carry. */
export const MAX_TARGET_RECORDS = 10_000;

export function isProcessingNeeded(decision: ProcessingDecision): boolean {
  return decision.processingType !== "NO_PROCESSING_NEEDED";
}

export function isFullProcessing(type: ProcessingType): boolean {
  return type === "FULL_REPROCESSING" || type === "FORCE_FULL_UPDATE";
}

export function describeDecision(decision: ProcessingDecision): string {
  const targets =
    decision.processingType === "INCREMENTAL_UPDATE"
      ? ` (${decision.targetRecords.length} records)`
      : "";
  return `${decision.processingType}${targets}: ${decision.reasoning}`;
}

/** Keep positive integer ids, first occurrence wins, capped at MAX_TARGET_RECORDS. */
export function normalizeTargetRecords(ids: readonly unknown[]): number[] {
  const seen = new Set<number>();
  for (const id of ids) {
    if (typeof id !== "number" || !Number.isInteger(id) || id < 1) continue;
    seen.add(id);
    if (seen.size >= MAX_TARGET_RECORDS) break;
  }
  return [...seen];
}
