import type pg from "pg";
import { z } from "zod";
import type { SyncEnvironment } from "../config.js";
import { RecordStoreError } from "../errors.js";
import type { ProcessMetadata, ProcessStatus } from "../models/metadata.js";
import type { MetadataStore } from "../store/record-store.js";
import type { RetryPolicy } from "../store/retry.js";
import { checkColumns, METADATA_COLUMNS, METADATA_TABLE, type SchemaCheck } from "../store/schema.js";
import {
  INSERT_PROCESS_METADATA,
  LATEST_PROCESS_METADATA,
  PROCESS_METADATA_HISTORY,
  PRUNE_PROCESS_METADATA,
  TABLE_COLUMNS,
} from "./queries.js";

const metadataRowSchema = z.object({
  processing_id: z.string(),
  process_name: z.string(),
  environment: z.enum(["development", "production"]),
  process_timestamp: z.date(),
  processing_type: z.enum(["FULL_REPROCESSING", "INCREMENTAL_UPDATE", "NO_PROCESSING_NEEDED", "FORCE_FULL_UPDATE"]),
  target_dataset_id: z.string(),
  region_dataset_id: z.string(),
  region_dataset_updated: z.date().nullable(),
  district_dataset_id: z.string(),
  district_dataset_updated: z.date().nullable(),
  process_status: z.enum(["Success", "Error"]),
  records_processed: z.coerce.number().int(),
  records_updated: z.coerce.number().int(),
  records_failed: z.coerce.number().int(),
  processing_duration_ms: z.coerce.number(),
  error_message: z.string().nullable(),
  metadata_details: z.record(z.unknown()).nullable(),
});

function toProcessMetadata(row: unknown): ProcessMetadata {
  const r = metadataRowSchema.parse(row);
  return {
    processingId: r.processing_id,
    processName: r.process_name,
    environment: r.environment,
    processTimestamp: r.process_timestamp,
    processingType: r.processing_type,
    targetDatasetId: r.target_dataset_id,
    regionDatasetId: r.region_dataset_id,
    regionDatasetUpdated: r.region_dataset_updated,
    districtDatasetId: r.district_dataset_id,
    districtDatasetUpdated: r.district_dataset_updated,
    processStatus: r.process_status,
    recordsProcessed: r.records_processed,
    recordsUpdated: r.records_updated,
    recordsFailed: r.records_failed,
    processingDurationMs: r.processing_duration_ms,
    errorMessage: r.error_message,
    metadataDetails: r.metadata_details ?? {},
  };
}

export class PostgresMetadataStore implements MetadataStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly retry: RetryPolicy,
  ) {}

  async readLatest(
    processName: string,
    environment: SyncEnvironment,
    options: { readonly status?: ProcessStatus } = {},
  ): Promise<ProcessMetadata | null> {
    return this.call("readLatest", async () => {
      const result = await this.pool.query<Record<string, unknown>>(LATEST_PROCESS_METADATA, [
        processName,
        environment,
        options.status ?? null,
      ]);
      const row = result.rows[0];
      return row === undefined ? null : toProcessMetadata(row);
    });
  }

  async write(metadata: ProcessMetadata): Promise<void> {
    await this.call("write", () =>
      this.pool.query(INSERT_PROCESS_METADATA, [
        metadata.processingId,
        metadata.processName,
        metadata.environment,
        metadata.processTimestamp,
        metadata.processingType,
        metadata.targetDatasetId,
        metadata.regionDatasetId,
        metadata.regionDatasetUpdated,
        metadata.districtDatasetId,
        metadata.districtDatasetUpdated,
        metadata.processStatus,
        metadata.recordsProcessed,
        metadata.recordsUpdated,
        metadata.recordsFailed,
        Math.round(metadata.processingDurationMs),
        metadata.errorMessage,
        JSON.stringify(metadata.metadataDetails),
      ]),
    );
  }

  async history(processName: string, environment: SyncEnvironment, since: Date): Promise<ProcessMetadata[]> {
    return this.call("history", async () => {
      const result = await this.pool.query<Record<string, unknown>>(PROCESS_METADATA_HISTORY, [
        processName,
        environment,
        since,
      ]);
      return result.rows.map(toProcessMetadata);
    });
  }

  async prune(processName: string, environment: SyncEnvironment, olderThan: Date): Promise<number> {
    return this.call("prune", async () => {
      const result = await this.pool.query(PRUNE_PROCESS_METADATA, [processName, environment, olderThan]);
      return result.rowCount ?? 0;
    });
  }

  async checkSchema(): Promise<SchemaCheck> {
    return this.call("checkSchema", async () => {
      const result = await this.pool.query<{ column_name: string }>(TABLE_COLUMNS, [METADATA_TABLE]);
      return checkColumns(
        METADATA_TABLE,
        METADATA_COLUMNS,
        result.rows.map((row) => row.column_name),
      );
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.retry.execute(`metadata ${operation}`, fn);
    } catch (err) {
      throw new RecordStoreError(`metadata ${operation}`, err);
    }
  }
}
