import type { Geometry } from "geojson";
import { z } from "zod";

export const REGION_CODE_LENGTH = 2;
export const DISTRICT_CODE_LENGTH = 5;

const ALPHANUMERIC = /^[A-Za-z0-9]+$/;
const GLOBAL_ID = /^\{?[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}\}?$/;

/** A point feature whose region and district columns this pipeline maintains. */
export interface TargetRecord {
  readonly objectId: number;
  readonly globalId: string;
  readonly regionCode: string | null;
  readonly districtCode: string | null;
  readonly editTimestamp: Date | null;
  readonly geometry: Geometry | null;
}

export function isValidRegionCode(code: string): boolean {
  return code.length === REGION_CODE_LENGTH && ALPHANUMERIC.test(code);
}

export function isValidDistrictCode(code: string): boolean {
  return code.length === DISTRICT_CODE_LENGTH && ALPHANUMERIC.test(code);
}

const regionCode = z
  .string()
  .refine(isValidRegionCode, `Region code must be exactly ${REGION_CODE_LENGTH} alphanumeric characters`);

const districtCode = z
  .string()
  .refine(isValidDistrictCode, `District code must be exactly ${DISTRICT_CODE_LENGTH} alphanumeric characters`);

// Coordinates are left loose here; validateGeometry decides whether a shape is usable.
const geometrySchema = z
  .object({
    type: z.enum(["Point", "LineString", "MultiLineString", "Polygon", "MultiPolygon"]),
    coordinates: z.array(z.unknown()),
  })
  .passthrough()
  .transform((g): Geometry | null => toGeometry(g.type, g.coordinates));

// Malformed stored codes read as unset so the next write replaces them, and
// unsupported shapes read as missing geometry.
export const targetRecordSchema = z.object({
  objectId: z.number().int().min(1),
  globalId: z.string().regex(GLOBAL_ID, "Global id must be a UUID"),
  regionCode: regionCode.nullable().catch(null),
  districtCode: districtCode.nullable().catch(null),
  editTimestamp: z.date().nullable(),
  geometry: geometrySchema.nullable().catch(null),
});

export function parseTargetRecord(input: unknown): TargetRecord {
  return targetRecordSchema.parse(input);
}

export function hasSpatialAssignments(record: TargetRecord): boolean {
  return record.regionCode !== null && record.districtCode !== null;
}

export function needsSpatialUpdate(record: TargetRecord): boolean {
  return record.regionCode === null || record.districtCode === null;
}

function isPosition(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === "number");
}

function isPositionList(value: unknown): value is number[][] {
  return Array.isArray(value) && value.every(isPosition);
}

function isPositionListList(value: unknown): value is number[][][] {
  return Array.isArray(value) && value.every(isPositionList);
}

/**
 * Narrow loosely-typed coordinates into a GeoJSON geometry. A point whose
 * coordinates are missing or non-numeric is kept with an empty position so
 * validation can flag it rather than the row failing to parse.
 */
function toGeometry(type: string, coordinates: unknown[]): Geometry | null {
  switch (type) {
    case "Point":
      return { type: "Point", coordinates: isPosition(coordinates) ? coordinates : [] };
    case "LineString":
      return isPositionList(coordinates) ? { type: "LineString", coordinates } : null;
    case "MultiLineString":
    case "Polygon":
      if (!isPositionListList(coordinates)) return null;
      return type === "Polygon"
        ? { type: "Polygon", coordinates }
        : { type: "MultiLineString", coordinates };
    case "MultiPolygon":
      return Array.isArray(coordinates) && coordinates.every(isPositionListList)
        ? { type: "MultiPolygon", coordinates }
        : null;
    default:
      return null;
  }
}
