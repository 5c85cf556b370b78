/** Columns each dataset must carry before a run touches it. */

export const TARGET_COLUMNS = [
  "object_id",
  "global_id",
  "region_code",
  "district_code",
  "edit_timestamp",
  "geom",
] as const;

export const BOUNDARY_COLUMNS = ["gid", "code", "updated_at", "geom"] as const;

export const METADATA_TABLE = "process_metadata";

export const METADATA_COLUMNS = [
  "processing_id",
  "process_name",
  "environment",
  "process_timestamp",
  "processing_type",
  "target_dataset_id",
  "region_dataset_id",
  "region_dataset_updated",
  "district_dataset_id",
  "district_dataset_updated",
  "process_status",
  "records_processed",
  "records_updated",
  "records_failed",
  "processing_duration_ms",
  "error_message",
  "metadata_details",
] as const;

export interface SchemaCheck {
  readonly datasetId: string;
  readonly exists: boolean;
  /** Required columns absent from the dataset, in required order. */
  readonly missingColumns: readonly string[];
}

/** A dataset reporting no columns at all does not exist. */
export function checkColumns(
  datasetId: string,
  required: readonly string[],
  present: readonly string[],
): SchemaCheck {
  if (present.length === 0) {
    return { datasetId, exists: false, missingColumns: [...required] };
  }
  const columns = new Set(present.map((c) => c.toLowerCase()));
  return { datasetId, exists: true, missingColumns: required.filter((c) => !columns.has(c)) };
}

export function schemaProblems(checks: readonly SchemaCheck[]): string[] {
  const problems: string[] = [];
  for (const check of checks) {
    if (!check.exists) problems.push(`Dataset ${check.datasetId} does not exist`);
    else if (check.missingColumns.length > 0) {
      problems.push(`Dataset ${check.datasetId} is missing columns: ${check.missingColumns.join(", ")}`);
    }
  }
  return problems;
}
