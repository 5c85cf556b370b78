#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs";
import { config, loadPipelineOptions, type PipelineOptions } from "./config.js";
import { closePool, getPool } from "./db/connection.js";
import { PostgisRecordStore } from "./db/postgis-record-store.js";
import { PostgresMetadataStore } from "./db/postgres-metadata-store.js";
import { statusQuery } from "./db/queries.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { describeDecision } from "./models/processing.js";
import { SpatialSyncPipeline } from "./pipeline.js";
import { RetryPolicy } from "./store/retry.js";

interface RunCommandOptions {
  dryRun?: boolean;
  forceFull?: boolean;
  batchSize?: string;
  fullThreshold?: string;
  incrementalThreshold?: string;
}

interface StatusRow {
  total_records: number;
  fully_assigned: number;
  needs_update: number;
  region_features: number;
  district_features: number;
}

function createPipeline(options: PipelineOptions): SpatialSyncPipeline {
  const pool = getPool(options.queryTimeoutMs);
  const retry = new RetryPolicy({ maxAttempts: options.retryMaxAttempts });
  const store = new PostgisRecordStore(
    pool,
    { target: options.targetDatasetId, region: options.regionDatasetId, district: options.districtDatasetId },
    retry,
  );
  return new SpatialSyncPipeline({ store, metadataStore: new PostgresMetadataStore(pool, retry), options });
}

/** Environment options with per-invocation flag overrides, validated by the same schema. */
function optionsFromFlags(flags: RunCommandOptions): PipelineOptions {
  return loadPipelineOptions({
    ...process.env,
    ...(flags.batchSize !== undefined ? { BATCH_SIZE: flags.batchSize } : {}),
    ...(flags.fullThreshold !== undefined ? { FULL_REPROCESS_PERCENTAGE: flags.fullThreshold } : {}),
    ...(flags.incrementalThreshold !== undefined
      ? { INCREMENTAL_THRESHOLD_PERCENTAGE: flags.incrementalThreshold }
      : {}),
  });
}

function positiveInteger(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError(`${flag} must be a positive integer, got '${value}'`);
  }
  return n;
}

const program = new Command();

program
  .name("region-district-sync")
  .description("Keep region and district codes on PostGIS point records in sync with boundary datasets")
  .version("0.1.0")
  .showHelpAfterError("(add --help for additional information)");

program
  .command("run")
  .description("Detect changes, assign region/district codes and write them back")
  .option("--dry-run", "Compute and merge assignments without writing anything")
  .option("--force-full", "Skip change detection and reprocess every record")
  .option("--batch-size <n>", "Records per batch (1-5000)")
  .option("--full-threshold <pct>", "Change percentage that forces full reprocessing")
  .option("--incremental-threshold <pct>", "Minimum change percentage for incremental processing")
  .action(async (opts: RunCommandOptions) => {
    const options = optionsFromFlags(opts);
    const controller = new AbortController();
    const onSigint = () => {
      console.log("\nInterrupt received, stopping after the current batch...");
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    try {
      const result = await createPipeline(options).run({
        dryRun: opts.dryRun ?? false,
        forceFull: opts.forceFull ?? false,
        signal: controller.signal,
      });

      console.log(`\n  Run ${result.success ? "complete" : "failed"}${opts.dryRun ? " (dry run)" : ""}`);
      console.log("  ─────────────────────────────");
      console.log(`  Processing type:   ${result.processingType ?? "none"}`);
      console.log(`  Records processed: ${result.recordsProcessed.toLocaleString()}`);
      console.log(`  Records updated:   ${result.recordsUpdated.toLocaleString()}`);
      console.log(`  Records failed:    ${result.recordsFailed.toLocaleString()}`);
      if (result.rolledBackBatches > 0) {
        console.log(`  Rolled back:       ${result.rolledBackBatches} batch(es), updates reverted`);
      }
      console.log(`  Metadata written:  ${result.metadataWritten ? "yes" : "no"}`);
      console.log(`  Duration:          ${(result.durationMs / 1000).toFixed(1)}s`);
      if (result.cancelled) console.log("  Cancelled before all batches ran.");
      for (const error of result.errors.slice(0, 10)) console.log(`  ! ${error}`);
      if (result.errors.length > 10) console.log(`  ... and ${result.errors.length - 10} more errors`);
      console.log();

      if (!result.success) process.exitCode = 1;
    } finally {
      process.removeListener("SIGINT", onSigint);
      await closePool();
    }
  });

program
  .command("detect")
  .description("Show the processing decision the next run would make")
  .action(async () => {
    try {
      const decision = await createPipeline(loadPipelineOptions()).detect();
      const detection = decision.changeDetection;
      console.log(`\n  ${describeDecision(decision)}`);
      if (detection !== null) {
        console.log(`  Baseline:          ${detection.sinceTimestamp.toISOString()}`);
        console.log(`  Total records:     ${detection.totalRecords.toLocaleString()}`);
        console.log(`  Modified records:  ${detection.modifiedRecords.toLocaleString()}`);
        console.log(`  New records:       ${detection.newRecords?.toLocaleString() ?? "unknown"}`);
        console.log(`  Change:            ${detection.changePercentage}%`);
      }
      console.log(`  Estimated time:    ${decision.estimatedProcessingTimeSec}s`);
      console.log();
    } finally {
      await closePool();
    }
  });

program
  .command("validate")
  .description("Check that the target, boundary and metadata tables have the columns a run needs")
  .action(async () => {
    try {
      const validation = await createPipeline(loadPipelineOptions()).validateSchema();
      console.log();
      for (const check of validation.checks) {
        const state = !check.exists
          ? "missing"
          : check.missingColumns.length > 0
            ? `missing ${check.missingColumns.join(", ")}`
            : "ok";
        console.log(`  ${check.datasetId.padEnd(24)} ${state}`);
      }
      console.log(validation.isValid ? "\n  Schema OK\n" : `\n  ${validation.problems.length} problem(s) found\n`);
      if (!validation.isValid) process.exitCode = 1;
    } finally {
      await closePool();
    }
  });

program
  .command("status")
  .description("Show record counts and the last successful run")
  .action(async () => {
    try {
      const options = loadPipelineOptions();
      const pool = getPool(options.queryTimeoutMs);
      const result = await pool.query<StatusRow>(
        statusQuery(options.targetDatasetId, options.regionDatasetId, options.districtDatasetId),
      );
      const s = result.rows[0];
      const last = await createPipeline(options).recorder.latestSuccessful();

      console.log("\n  Region/District Sync - Status");
      console.log("  ─────────────────────────────");
      if (s !== undefined) {
        console.log(`  Records total:     ${s.total_records.toLocaleString()}`);
        console.log(`  Fully assigned:    ${s.fully_assigned.toLocaleString()}`);
        console.log(`  Needs update:      ${s.needs_update.toLocaleString()}`);
        console.log(`  Region features:   ${s.region_features.toLocaleString()}`);
        console.log(`  District features: ${s.district_features.toLocaleString()}`);
      }
      console.log(
        last === null
          ? "  Last success:      never"
          : `  Last success:      ${last.processTimestamp.toISOString()} (${last.processingType})`,
      );
      console.log();
    } finally {
      await closePool();
    }
  });

program
  .command("history")
  .description("List recorded runs")
  .option("--days <n>", "How many days back to list", "30")
  .action(async (opts: { days: string }) => {
    try {
      const days = positiveInteger(opts.days, "--days");
      const runs = await createPipeline(loadPipelineOptions()).recorder.history(days);
      if (runs.length === 0) console.log(`No runs recorded in the last ${opts.days} days.`);
      for (const run of runs) {
        console.log(
          `  ${run.processTimestamp.toISOString()}  ${run.processStatus.padEnd(7)}  ${run.processingType.padEnd(20)}  ` +
            `${run.recordsUpdated}/${run.recordsProcessed} updated, ${run.recordsFailed} failed  ` +
            `${(run.processingDurationMs / 1000).toFixed(1)}s`,
        );
      }
    } finally {
      await closePool();
    }
  });

program
  .command("prune-metadata")
  .description("Delete run metadata older than the retention period")
  .option("--retention-days <n>", "Days of metadata to keep (default METADATA_RETENTION_DAYS)")
  .action(async (opts: { retentionDays?: string }) => {
    try {
      const options = loadPipelineOptions();
      const days =
        opts.retentionDays === undefined
          ? options.metadataRetentionDays
          : positiveInteger(opts.retentionDays, "--retention-days");
      const deleted = await createPipeline(options).recorder.prune(days);
      console.log(`Deleted ${deleted} metadata rows older than ${days} days.`);
    } finally {
      await closePool();
    }
  });

program
  .command("init-db")
  .description("Create the tables and indexes the sync expects")
  .option("--file <path>", "Schema SQL file", config.schemaFile)
  .action(async (opts: { file: string }) => {
    try {
      const sql = fs.readFileSync(opts.file, "utf-8");
      await getPool().query(sql);
      console.log(`Schema applied from ${opts.file}`);
    } finally {
      await closePool();
    }
  });

program.parseAsync().catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exitCode = 1;
});
