// Dataset ids double as table names. They are restricted to [A-Za-z0-9_-]
// by the config schema and always quoted here.
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function countRecordsSql(table: string, where: string): string {
  return `SELECT COUNT(*)::int AS count FROM ${quoteIdentifier(table)} WHERE ${where};`;
}

export function selectRecordsSql(
  table: string,
  where: string,
  includeGeometry: boolean,
  paging: string,
): string {
  const geometry = includeGeometry ? "ST_AsGeoJSON(geom) AS geojson" : "NULL::text AS geojson";
  return `
  SELECT object_id, global_id::text AS global_id, region_code, district_code, edit_timestamp, ${geometry}
  FROM ${quoteIdentifier(table)}
  WHERE ${where}
  ORDER BY object_id${paging};
`;
}

/** SET list only names the fields present so a partial update leaves the other column alone. */
export function updateAssignmentSql(
  table: string,
  fields: readonly ("region_code" | "district_code")[],
): string {
  const assignments = fields.map((field, i) => `${field} = $${i + 2}`).join(", ");
  return `UPDATE ${quoteIdentifier(table)} SET ${assignments} WHERE object_id = $1;`;
}

export function intersectingBoundariesSql(table: string, codeField: string): string {
  return `
  SELECT ${quoteIdentifier(codeField)}::text AS code
  FROM ${quoteIdentifier(table)}
  WHERE ST_Intersects(geom, ST_SetSRID(ST_GeomFromGeoJSON($1), 4326))
  ORDER BY gid;
`;
}

export function describeBoundarySql(table: string): string {
  return `
  SELECT COUNT(*)::int AS feature_count, MAX(updated_at) AS last_modified
  FROM ${quoteIdentifier(table)};
`;
}

export const TABLE_COLUMNS = `
  SELECT column_name::text AS column_name
  FROM information_schema.columns
  WHERE table_schema = current_schema() AND table_name = $1
  ORDER BY ordinal_position;
`;

export const INSERT_PROCESS_METADATA = `
  INSERT INTO process_metadata (
    processing_id, process_name, environment, process_timestamp, processing_type,
    target_dataset_id, region_dataset_id, region_dataset_updated,
    district_dataset_id, district_dataset_updated, process_status,
    records_processed, records_updated, records_failed, processing_duration_ms,
    error_message, metadata_details
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17);
`;

const METADATA_SELECT = `
    processing_id::text AS processing_id, process_name, environment, process_timestamp,
    processing_type, target_dataset_id, region_dataset_id, region_dataset_updated,
    district_dataset_id, district_dataset_updated, process_status, records_processed,
    records_updated, records_failed, processing_duration_ms, error_message, metadata_details`;

export const LATEST_PROCESS_METADATA = `
  SELECT ${METADATA_SELECT}
  FROM process_metadata
  WHERE process_name = $1 AND environment = $2 AND ($3::text IS NULL OR process_status = $3)
  ORDER BY process_timestamp DESC
  LIMIT 1;
`;

export const PROCESS_METADATA_HISTORY = `
  SELECT ${METADATA_SELECT}
  FROM process_metadata
  WHERE process_name = $1 AND environment = $2 AND process_timestamp >= $3
  ORDER BY process_timestamp DESC;
`;

export const PRUNE_PROCESS_METADATA = `
  DELETE FROM process_metadata
  WHERE process_name = $1 AND environment = $2 AND process_timestamp < $3;
`;

export function statusQuery(target: string, region: string, district: string): string {
  return `
  SELECT
    (SELECT COUNT(*) FROM ${quoteIdentifier(target)})::int AS total_records,
    (SELECT COUNT(*) FROM ${quoteIdentifier(target)}
      WHERE region_code IS NOT NULL AND district_code IS NOT NULL)::int AS fully_assigned,
    (SELECT COUNT(*) FROM ${quoteIdentifier(target)}
      WHERE region_code IS NULL OR district_code IS NULL)::int AS needs_update,
    (SELECT COUNT(*) FROM ${quoteIdentifier(region)})::int AS region_features,
    (SELECT COUNT(*) FROM ${quoteIdentifier(district)})::int AS district_features;
`;
}
