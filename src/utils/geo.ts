import type { GeoPoint, LegMetric } from "../types";

const EARTH_RADIUS_KM = 6371;

function toRadians(value: number): number {
  return (value * Math.PI) / 180;
}

export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);

  const sinLat = Math.sin(dLat / 2);
  const sinLon = Math.sin(dLon / 2);
  const aa = sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLon * sinLon;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(aa), Math.sqrt(1 - aa));
}

export function haversineMeters(a: GeoPoint, b: GeoPoint): number {
  return haversineKm(a, b) * 1000;
}

export function lerpPoint(a: GeoPoint, b: GeoPoint, t: number): GeoPoint {
  if (t <= 0) return { lat: a.lat, lon: a.lon };
  if (t >= 1) return { lat: b.lat, lon: b.lon };
  return {
    lat: a.lat + (b.lat - a.lat) * t,
    lon: a.lon + (b.lon - a.lon) * t,
  };
}

/**
 * Closeness of a point to the leg `from -> to`, in plain degree space.
 * Lower is closer.
 *
 * `perpendicular` measures the distance to the infinite line through both
 * endpoints and divides it by the leg length; a point beyond either end can
 * still score as close. `segment` clamps the projection to the leg first.
 */
export function legCloseness(
  point: GeoPoint,
  from: GeoPoint,
  to: GeoPoint,
  metric: LegMetric = "segment",
): number {
  const dx = to.lon - from.lon;
  const dy = to.lat - from.lat;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) return Number.POSITIVE_INFINITY;

  const px = point.lon - from.lon;
  const py = point.lat - from.lat;

  if (metric === "perpendicular") {
    const cross = Math.abs(dx * py - dy * px);
    return cross / lengthSq;
  }

  const t = Math.max(0, Math.min(1, (px * dx + py * dy) / lengthSq));
  const closestX = dx * t;
  const closestY = dy * t;
  return Math.hypot(px - closestX, py - closestY) / Math.sqrt(lengthSq);
}

export function closestLegIndex(
  point: GeoPoint,
  legs: Array<{ from: GeoPoint; to: GeoPoint }>,
  metric: LegMetric = "segment",
): number {
  let bestIndex = -1;
  let bestScore = Number.POSITIVE_INFINITY;

  legs.forEach((leg, index) => {
    const score = legCloseness(point, leg.from, leg.to, metric);
    if (score < bestScore) {
      bestScore = score;
      bestIndex = index;
    }
  });

  return bestIndex;
}
