import type { GeoPoint, PolylineLeg, PolylinePoint } from "../types";

/**
 * Splits an annotated polyline into legs between consecutive stations.
 * Points before the first and after the last annotated station belong to no
 * leg.
 */
export function splitPolylineIntoLegs(points: PolylinePoint[]): PolylineLeg[] {
  const legs: PolylineLeg[] = [];
  let currentStation: number | null = null;
  let buffer: GeoPoint[] = [];

  for (const point of points) {
    const position = { lat: point.lat, lon: point.lon };

    if (point.stationId === null) {
      if (currentStation !== null) buffer.push(position);
      continue;
    }

    if (currentStation === null || point.stationId === currentStation) {
      if (currentStation === null) buffer = [];
      currentStation = point.stationId;
      buffer.push(position);
      continue;
    }

    buffer.push(position);
    legs.push({ fromStationId: currentStation, toStationId: point.stationId, points: buffer });
    currentStation = point.stationId;
    buffer = [position];
  }

  return legs;
}
