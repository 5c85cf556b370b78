import type { Geometry } from "geojson";
import type { ProcessMetadata, ProcessStatus } from "../models/metadata.js";
import type { TargetRecord } from "../models/target-record.js";
import type { SyncEnvironment } from "../config.js";
import type { SchemaCheck } from "./schema.js";

/** Which target records a count or query selects. */
export type RecordPredicate =
  | { readonly kind: "all" }
  | { readonly kind: "editedSince"; readonly since: Date }
  | { readonly kind: "createdSince"; readonly since: Date }
  | { readonly kind: "idIn"; readonly objectIds: readonly number[] };

export const ALL_RECORDS: RecordPredicate = { kind: "all" };

/** Readable form of a predicate for logs and decision snapshots. Never executed. */
export function describePredicate(predicate: RecordPredicate): string {
  switch (predicate.kind) {
    case "all":
      return "1=1";
    case "editedSince":
      return `edit_timestamp > '${predicate.since.toISOString()}'`;
    case "createdSince":
      return `created_at > '${predicate.since.toISOString()}'`;
    case "idIn":
      return `object_id IN (${predicate.objectIds.join(",")})`;
  }
}

export interface QueryOptions {
  readonly includeGeometry: boolean;
  readonly offset?: number;
  readonly limit?: number;
}

/** Changed fields for one record. Fields left out are not touched. */
export interface RecordUpdate {
  readonly objectId: number;
  readonly regionCode?: string | null;
  readonly districtCode?: string | null;
}

export interface WriteResult {
  readonly objectId: number;
  readonly success: boolean;
  readonly error?: string;
}

export type BoundaryKind = "region" | "district";

export interface BoundaryHandle {
  readonly kind: BoundaryKind;
  readonly datasetId: string;
  readonly codeField: string;
  readonly featureCount: number;
  readonly lastModified: Date | null;
}

export interface BoundaryMatch {
  readonly code: string;
}

export interface RecordStore {
  count(predicate: RecordPredicate): Promise<number>;
  /** Records ordered by object id. */
  query(predicate: RecordPredicate, options: QueryOptions): Promise<TargetRecord[]>;
  /** One result per update, in input order. */
  batchWrite(updates: readonly RecordUpdate[]): Promise<WriteResult[]>;
  /** Boundaries whose polygon intersects the geometry, in feature order. */
  spatialQuery(boundary: BoundaryHandle, geometry: Geometry): Promise<BoundaryMatch[]>;
  describeBoundary(kind: BoundaryKind): Promise<BoundaryHandle>;
  /** Required columns of the target dataset, then the region and district datasets. */
  checkSchema(): Promise<SchemaCheck[]>;
}

export interface MetadataStore {
  readLatest(
    processName: string,
    environment: SyncEnvironment,
    options?: { readonly status?: ProcessStatus },
  ): Promise<ProcessMetadata | null>;
  write(metadata: ProcessMetadata): Promise<void>;
  /** Newest first. */
  history(processName: string, environment: SyncEnvironment, since: Date): Promise<ProcessMetadata[]>;
  prune(processName: string, environment: SyncEnvironment, olderThan: Date): Promise<number>;
  checkSchema(): Promise<SchemaCheck>;
}
