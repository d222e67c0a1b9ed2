import type { GeoPoint, ShapePoint } from "../types";
import { DataIntegrityError } from "../utils/errors";
import { haversineMeters } from "../utils/geo";

/**
 * Inserts linearly blended samples so that no two adjacent samples are more
 * than `spacingMeters` apart by cumulative distance. Coordinates are blended
 * in degree space, which is close enough at this spacing.
 */
export function densifyShape(points: ShapePoint[], spacingMeters: number): ShapePoint[] {
  if (spacingMeters <= 0) {
    throw new RangeError("spacingMeters must be positive");
  }
  if (points.length === 0) return [];

  const result: ShapePoint[] = [points[0]];

  for (let i = 1; i < points.length; i += 1) {
    const start = points[i - 1];
    const end = points[i];
    const gap = end.distance - start.distance;

    if (gap < 0) {
      throw new DataIntegrityError(
        `Shape distance decreases from ${start.distance} to ${end.distance} at sample ${i}`,
      );
    }

    const steps = Math.ceil(gap / spacingMeters);
    for (let step = 1; step < steps; step += 1) {
      const t = step / steps;
      result.push({
        lat: start.lat + (end.lat - start.lat) * t,
        lon: start.lon + (end.lon - start.lon) * t,
        distance: start.distance + gap * t,
      });
    }

    result.push(end);
  }

  return result;
}

export function measurePath(points: GeoPoint[]): ShapePoint[] {
  let distance = 0;
  return points.map((point, index) => {
    if (index > 0) distance += haversineMeters(points[index - 1], point);
    return { lat: point.lat, lon: point.lon, distance };
  });
}

export function resamplePath(points: GeoPoint[], spacingMeters: number): ShapePoint[] {
  return densifyShape(measurePath(points), spacingMeters);
}
