import type { Geometry } from "geojson";
import type pg from "pg";
import { RecordStoreError } from "../errors.js";
import { createLogger } from "../logger.js";
import { parseTargetRecord, type TargetRecord } from "../models/target-record.js";
import type {
  BoundaryHandle,
  BoundaryKind,
  BoundaryMatch,
  QueryOptions,
  RecordPredicate,
  RecordStore,
  RecordUpdate,
  WriteResult,
} from "../store/record-store.js";
import type { RetryPolicy } from "../store/retry.js";
import { BOUNDARY_COLUMNS, checkColumns, TARGET_COLUMNS, type SchemaCheck } from "../store/schema.js";
import {
  countRecordsSql,
  describeBoundarySql,
  intersectingBoundariesSql,
  selectRecordsSql,
  TABLE_COLUMNS,
  updateAssignmentSql,
} from "./queries.js";

const log = createLogger("postgis-store");

export interface DatasetTables {
  readonly target: string;
  readonly region: string;
  readonly district: string;
}

export interface PredicateSql {
  readonly where: string;
  readonly params: unknown[];
}

const BOUNDARY_CODE_FIELD = "code";

/** Translate a predicate into a parameterized WHERE clause; values never enter the SQL text. */
export function buildPredicateSql(predicate: RecordPredicate, firstParam = 1): PredicateSql {
  switch (predicate.kind) {
    case "all":
      return { where: "TRUE", params: [] };
    case "editedSince":
      return { where: `edit_timestamp > $${firstParam}`, params: [predicate.since] };
    case "createdSince":
      return { where: `created_at > $${firstParam}`, params: [predicate.since] };
    case "idIn":
      if (predicate.objectIds.length === 0) return { where: "FALSE", params: [] };
      return { where: `object_id = ANY($${firstParam}::int[])`, params: [[...predicate.objectIds]] };
  }
}

interface TargetRow {
  object_id: number;
  global_id: string;
  region_code: string | null;
  district_code: string | null;
  edit_timestamp: Date | null;
  geojson: string | null;
}

interface BoundaryRow {
  feature_count: number;
  last_modified: Date | null;
}

function toTargetRecord(row: TargetRow): TargetRecord {
  const geometry: unknown = row.geojson === null ? null : JSON.parse(row.geojson);
  return parseTargetRecord({
    objectId: row.object_id,
    globalId: row.global_id,
    regionCode: row.region_code,
    districtCode: row.district_code,
    editTimestamp: row.edit_timestamp,
    geometry,
  });
}

/** RecordStore over a PostGIS database. Each call goes through the retry policy. */
export class PostgisRecordStore implements RecordStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly tables: DatasetTables,
    private readonly retry: RetryPolicy,
  ) {}

  async count(predicate: RecordPredicate): Promise<number> {
    const { where, params } = buildPredicateSql(predicate);
    return this.call("count", async () => {
      const result = await this.pool.query<{ count: number }>(countRecordsSql(this.tables.target, where), params);
      return result.rows[0]?.count ?? 0;
    });
  }

  async query(predicate: RecordPredicate, options: QueryOptions): Promise<TargetRecord[]> {
    const { where, params } = buildPredicateSql(predicate);
    let paging = "";
    if (options.offset !== undefined) {
      params.push(options.offset);
      paging += ` OFFSET $${params.length}`;
    }
    if (options.limit !== undefined) {
      params.push(options.limit);
      paging += ` LIMIT $${params.length}`;
    }
    const sql = selectRecordsSql(this.tables.target, where, options.includeGeometry, paging);

    return this.call("query", async () => {
      const result = await this.pool.query<TargetRow>(sql, params);
      return result.rows.map(toTargetRecord);
    });
  }

  /**
   * One transaction, one savepoint per record: a failing record is rolled back
   * to its savepoint and reported while the rest of the batch commits.
   */
  async batchWrite(updates: readonly RecordUpdate[]): Promise<WriteResult[]> {
    if (updates.length === 0) return [];

    return this.call("batchWrite", async () => {
      const client = await this.pool.connect();
      try {
        await client.query("BEGIN");
        const results: WriteResult[] = [];
        for (const update of updates) {
          results.push(await this.writeOne(client, update));
        }
        await client.query("COMMIT");
        return results;
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      } finally {
        client.release();
      }
    });
  }

  async spatialQuery(boundary: BoundaryHandle, geometry: Geometry): Promise<BoundaryMatch[]> {
    const table = boundary.kind === "region" ? this.tables.region : this.tables.district;
    return this.call("spatialQuery", async () => {
      const result = await this.pool.query<{ code: string | null }>(
        intersectingBoundariesSql(table, boundary.codeField),
        [JSON.stringify(geometry)],
      );
      const matches: BoundaryMatch[] = [];
      for (const row of result.rows) {
        if (row.code !== null) matches.push({ code: row.code });
      }
      return matches;
    });
  }

  async describeBoundary(kind: BoundaryKind): Promise<BoundaryHandle> {
    const datasetId = kind === "region" ? this.tables.region : this.tables.district;
    return this.call("describeBoundary", async () => {
      const result = await this.pool.query<BoundaryRow>(describeBoundarySql(datasetId));
      const row = result.rows[0];
      log.debug("Boundary dataset opened", { kind, datasetId, features: row?.feature_count ?? 0 });
      return {
        kind,
        datasetId,
        codeField: BOUNDARY_CODE_FIELD,
        featureCount: row?.feature_count ?? 0,
        lastModified: row?.last_modified ?? null,
      };
    });
  }

  async checkSchema(): Promise<SchemaCheck[]> {
    return this.call("checkSchema", async () => {
      const { target, region, district } = this.tables;
      const checks = [
        checkColumns(target, TARGET_COLUMNS, await this.columnsOf(target)),
        checkColumns(region, BOUNDARY_COLUMNS, await this.columnsOf(region)),
        checkColumns(district, BOUNDARY_COLUMNS, await this.columnsOf(district)),
      ];
      log.debug("Schema checked", { datasets: checks.map((c) => c.datasetId) });
      return checks;
    });
  }

  private async columnsOf(table: string): Promise<string[]> {
    const result = await this.pool.query<{ column_name: string }>(TABLE_COLUMNS, [table]);
    return result.rows.map((row) => row.column_name);
  }

  private async writeOne(client: pg.PoolClient, update: RecordUpdate): Promise<WriteResult> {
    const fields: ("region_code" | "district_code")[] = [];
    const values: (string | null)[] = [];
    if (update.regionCode !== undefined) {
      fields.push("region_code");
      values.push(update.regionCode);
    }
    if (update.districtCode !== undefined) {
      fields.push("district_code");
      values.push(update.districtCode);
    }
    if (fields.length === 0) {
      return { objectId: update.objectId, success: false, error: "No fields to update" };
    }

    await client.query("SAVEPOINT record_write");
    try {
      const result = await client.query(updateAssignmentSql(this.tables.target, fields), [
        update.objectId,
        ...values,
      ]);
      if (result.rowCount === 0) {
        await client.query("ROLLBACK TO SAVEPOINT record_write");
        return { objectId: update.objectId, success: false, error: "Record not found" };
      }
      await client.query("RELEASE SAVEPOINT record_write");
      return { objectId: update.objectId, success: true };
    } catch (err) {
      await client.query("ROLLBACK TO SAVEPOINT record_write");
      return {
        objectId: update.objectId,
        success: false,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.retry.execute(operation, fn);
    } catch (err) {
      throw new RecordStoreError(operation, err);
    }
  }
}
