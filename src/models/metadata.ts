import type { SyncEnvironment } from "../config.js";
import type { ProcessingType } from "./processing.js";

export type ProcessStatus = "Success" | "Error";

/** One accepted run. The latest successful row is the next run's baseline. */
export interface ProcessMetadata {
  readonly processingId: string;
  readonly processName: string;
  readonly environment: SyncEnvironment;
  readonly processTimestamp: Date;
  readonly processingType: ProcessingType;
  readonly targetDatasetId: string;
  readonly regionDatasetId: string;
  readonly regionDatasetUpdated: Date | null;
  readonly districtDatasetId: string;
  readonly districtDatasetUpdated: Date | null;
  readonly processStatus: ProcessStatus;
  readonly recordsProcessed: number;
  readonly recordsUpdated: number;
  readonly recordsFailed: number;
  readonly processingDurationMs: number;
  readonly errorMessage: string | null;
  readonly metadataDetails: Readonly<Record<string, unknown>>;
}

export interface MetadataValidation {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export function metadataSuccessRate(metadata: ProcessMetadata): number {
  return metadata.recordsProcessed === 0 ? 0 : metadata.recordsUpdated / metadata.recordsProcessed;
}
