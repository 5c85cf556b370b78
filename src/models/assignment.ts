export type ProcessingMethod =
  | "FULL_INTERSECTION"
  | "CACHED_INTERSECTION"
  | "GEOMETRY_REPAIR"
  | "FALLBACK_ASSIGNMENT";

export type AssignmentStatus = "both_assigned" | "region_only" | "district_only" | "no_assignment";

/** Result of locating one target record in the region and district boundary sets. */
export interface SpatialAssignment {
  readonly objectId: number;
  readonly regionCode: string | null;
  readonly districtCode: string | null;
  /** 1.0 when both codes were found, 0.5 for one, 0.0 for none. */
  readonly intersectionQuality: number;
  readonly processingMethod: ProcessingMethod;
  readonly geometryValid: boolean;
  readonly processingDurationMs: number;
}

export function getAssignmentStatus(assignment: SpatialAssignment): AssignmentStatus {
  const hasRegion = assignment.regionCode !== null;
  const hasDistrict = assignment.districtCode !== null;
  if (hasRegion && hasDistrict) return "both_assigned";
  if (hasRegion) return "region_only";
  if (hasDistrict) return "district_only";
  return "no_assignment";
}

export function isSuccessfulAssignment(assignment: SpatialAssignment): boolean {
  return assignment.regionCode !== null || assignment.districtCode !== null;
}

export function calculateIntersectionQuality(
  regionCode: string | null,
  districtCode: string | null,
): number {
  let found = 0;
  if (regionCode !== null) found++;
  if (districtCode !== null) found++;
  return roundQuality(found / 2);
}

export function roundQuality(value: number): number {
  const clamped = Math.min(1, Math.max(0, value));
  return Math.round(clamped * 1000) / 1000;
}

export function emptyStatusTally(): Record<AssignmentStatus, number> {
  return { both_assigned: 0, region_only: 0, district_only: 0, no_assignment: 0 };
}
