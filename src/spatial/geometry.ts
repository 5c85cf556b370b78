import type { Geometry } from "geojson";

const CACHE_KEY_DECIMALS = 6;
const CACHE_KEY_SCALE = 10 ** CACHE_KEY_DECIMALS;

// Adding 0 turns -0 into 0, so -1e-7 and 1e-7 share a key.
function keyCoordinate(value: number): string {
  return (Math.round(value * CACHE_KEY_SCALE) / CACHE_KEY_SCALE + 0).toFixed(CACHE_KEY_DECIMALS);
}

/**
 * A point needs two finite numeric coordinates; paths and rings need at least
 * one element. Other geometry types are not assignable.
 */
export function validateGeometry(geometry: Geometry | null): boolean {
  if (geometry === null) return false;
  switch (geometry.type) {
    case "Point": {
      const [x, y] = geometry.coordinates;
      return Number.isFinite(x) && Number.isFinite(y);
    }
    case "LineString":
    case "MultiLineString":
    case "Polygon":
    case "MultiPolygon":
      return geometry.coordinates.length > 0;
    default:
      return false;
  }
}

/** Assignment cache key. Only points are cached; two points within 1e-6 share a key. */
export function geometryCacheKey(geometry: Geometry): string | null {
  if (geometry.type !== "Point") return null;
  const [x, y] = geometry.coordinates;
  if (x === undefined || y === undefined) return null;
  return `point_${keyCoordinate(x)}_${keyCoordinate(y)}`;
}
