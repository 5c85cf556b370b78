import type { SpatialAssignment } from "../models/assignment.js";
import {
  DISTRICT_CODE_LENGTH,
  REGION_CODE_LENGTH,
  isValidDistrictCode,
  isValidRegionCode,
} from "../models/target-record.js";
import { err, ok, type Outcome } from "../outcome.js";

/**
 * Structural checks run before a batch touches the store. Any violation fails
 * the whole batch; the error list names every offending assignment.
 */
export function validateAssignments(
  assignments: readonly SpatialAssignment[],
): Outcome<readonly SpatialAssignment[], readonly string[]> {
  const errors: string[] = [];
  const seen = new Set<number>();

  assignments.forEach((a, index) => {
    const label = `Assignment ${index} (object ${a.objectId})`;
    if (!Number.isInteger(a.objectId) || a.objectId < 1) {
      errors.push(`${label}: object id must be a positive integer`);
    } else if (seen.has(a.objectId)) {
      errors.push(`${label}: duplicate object id`);
    } else {
      seen.add(a.objectId);
    }
    if (!Number.isFinite(a.intersectionQuality) || a.intersectionQuality < 0 || a.intersectionQuality > 1) {
      errors.push(`${label}: intersection quality ${a.intersectionQuality} outside [0, 1]`);
    }
    if (a.regionCode !== null && !isValidRegionCode(a.regionCode)) {
      errors.push(`${label}: region code '${a.regionCode}' must be ${REGION_CODE_LENGTH} alphanumeric characters`);
    }
    if (a.districtCode !== null && !isValidDistrictCode(a.districtCode)) {
      errors.push(
        `${label}: district code '${a.districtCode}' must be ${DISTRICT_CODE_LENGTH} alphanumeric characters`,
      );
    }
  });

  return errors.length === 0 ? ok(assignments) : err(errors);
}
