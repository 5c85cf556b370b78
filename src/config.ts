import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = path.resolve(__dirname, "..");

dotenv.config({ path: path.join(PROJECT_ROOT, ".env") });

const envBoolean = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === "true" || v === "1"));

const datasetId = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, hyphens and underscores");

export const pipelineOptionsSchema = z.object({
  BATCH_SIZE: z.coerce.number().int().min(1).max(5000).default(250),
  FULL_REPROCESS_PERCENTAGE: z.coerce.number().min(0).max(100).default(25),
  INCREMENTAL_THRESHOLD_PERCENTAGE: z.coerce.number().min(0).max(100).default(1),
  MAX_INCREMENTAL_RECORDS: z.coerce.number().int().min(1).max(10_000).default(1000),
  ROLLBACK_ON_PARTIAL_FAILURE: envBoolean(false),
  ROLLBACK_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  ROLLBACK_STRATEGY: z.enum(["clear", "restore-previous"]).default("clear"),
  METADATA_SUCCESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.95),
  VALIDATION_ENABLED: envBoolean(true),
  REPROCESS_ON_BOUNDARY_CHANGE: envBoolean(false),
  PROCESS_NAME: datasetId.default("region_district_sync"),
  SYNC_ENVIRONMENT: z.enum(["development", "production"]).default("development"),
  TARGET_DATASET_ID: datasetId.default("target_points"),
  REGION_DATASET_ID: datasetId.default("region_boundaries"),
  DISTRICT_DATASET_ID: datasetId.default("district_boundaries"),
  QUERY_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600_000).default(30_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  METADATA_RETENTION_DAYS: z.coerce.number().int().min(1).default(90),
});

export type RollbackStrategy = "clear" | "restore-previous";
export type SyncEnvironment = "development" | "production";

export interface PipelineOptions {
  readonly batchSize: number;
  readonly fullReprocessPercentage: number;
  readonly incrementalThresholdPercentage: number;
  readonly maxIncrementalRecords: number;
  readonly rollbackOnPartialFailure: boolean;
  readonly rollbackThreshold: number;
  readonly rollbackStrategy: RollbackStrategy;
  readonly metadataSuccessThreshold: number;
  readonly validationEnabled: boolean;
  readonly reprocessOnBoundaryChange: boolean;
  readonly processName: string;
  readonly environment: SyncEnvironment;
  readonly targetDatasetId: string;
  readonly regionDatasetId: string;
  readonly districtDatasetId: string;
  readonly queryTimeoutMs: number;
  readonly retryMaxAttempts: number;
  readonly metadataRetentionDays: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = loadPipelineOptions({});

/**
 * Parse pipeline options from environment-style key/value pairs.
 * Empty strings count as unset so a blank `.env` entry falls back to the default.
 */
export function loadPipelineOptions(
  env: Readonly<Record<string, string | undefined>> = process.env,
): PipelineOptions {
  const input: Record<string, string> = {};
  for (const key of Object.keys(pipelineOptionsSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") input[key] = value.trim();
  }

  const parsed = pipelineOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join("; ")}`, { issues });
  }

  const o = parsed.data;
  return {
    batchSize: o.BATCH_SIZE,
    fullReprocessPercentage: o.FULL_REPROCESS_PERCENTAGE,
    incrementalThresholdPercentage: o.INCREMENTAL_THRESHOLD_PERCENTAGE,
    maxIncrementalRecords: o.MAX_INCREMENTAL_RECORDS,
    rollbackOnPartialFailure: o.ROLLBACK_ON_PARTIAL_FAILURE,
    rollbackThreshold: o.ROLLBACK_THRESHOLD,
    rollbackStrategy: o.ROLLBACK_STRATEGY,
    metadataSuccessThreshold: o.METADATA_SUCCESS_THRESHOLD,
    validationEnabled: o.VALIDATION_ENABLED,
    reprocessOnBoundaryChange: o.REPROCESS_ON_BOUNDARY_CHANGE,
    processName: o.PROCESS_NAME,
    environment: o.SYNC_ENVIRONMENT,
    targetDatasetId: o.TARGET_DATASET_ID,
    regionDatasetId: o.REGION_DATASET_ID,
    districtDatasetId: o.DISTRICT_DATASET_ID,
    queryTimeoutMs: o.QUERY_TIMEOUT_MS,
    retryMaxAttempts: o.RETRY_MAX_ATTEMPTS,
    metadataRetentionDays: o.METADATA_RETENTION_DAYS,
  };
}

export const config = {
  // Use DATABASE_URL if set, otherwise build from individual PG* vars.
  // Individual params avoid URL-encoding issues with special chars in passwords.
  databaseUrl: process.env.DATABASE_URL ?? undefined,
  dbConfig: {
    user: process.env.PGUSER ?? "postgres",
    password: process.env.PGPASSWORD ?? "postgres",
    host: process.env.PGHOST ?? "localhost",
    port: parseInt(process.env.PGPORT ?? "5432", 10),
    database: process.env.PGDATABASE ?? "assignments_db",
  },
  schemaFile: path.join(PROJECT_ROOT, "sql", "schema.sql"),
};
