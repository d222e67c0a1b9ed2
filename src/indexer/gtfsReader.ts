import fs from "fs";
import path from "path";
import * as Papa from "papaparse";
import type { PolylinePoint, ShapePoint, TripStop } from "../types";
import { measurePath } from "./shapeDensifier";

type CsvRow = Record<string, string | undefined>;

export type GtfsTrip = {
  tripId: string;
  shapeId: string;
  stops: TripStop[];
};

export type GtfsFeed = {
  shapes: Map<string, ShapePoint[]>;
  trips: GtfsTrip[];
};

export function streamCsv(file: string, onRow: (row: CsvRow) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    Papa.parse<CsvRow>(fs.createReadStream(file, "utf8"), {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.trim(),
      step: (result) => onRow(result.data),
      complete: () => resolve(),
      error: (error) => reject(error),
    });
  });
}

function toNumber(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return Number.NaN;
  return Number.parseFloat(raw);
}

async function readShapes(dir: string, distanceScale: number): Promise<Map<string, ShapePoint[]>> {
  const raw = new Map<string, Array<{ sequence: number; point: ShapePoint }>>();

  await streamCsv(path.join(dir, "shapes.txt"), (row) => {
    const shapeId = row.shape_id;
    const lat = toNumber(row.shape_pt_lat);
    const lon = toNumber(row.shape_pt_lon);
    if (!shapeId || !Number.isFinite(lat) || !Number.isFinite(lon)) return;

    const entries = raw.get(shapeId) ?? [];
    entries.push({
      sequence: toNumber(row.shape_pt_sequence),
      point: { lat, lon, distance: toNumber(row.shape_dist_traveled) * distanceScale },
    });
    raw.set(shapeId, entries);
  });

  const shapes = new Map<string, ShapePoint[]>();
  for (const [shapeId, entries] of raw) {
    const points = entries
      .sort((a, b) => a.sequence - b.sequence)
      .map((entry) => entry.point);

    // Feeds without shape_dist_traveled get distances measured along the shape.
    const hasDistances = points.every((point) => Number.isFinite(point.distance));
    shapes.set(shapeId, hasDistances ? points : measurePath(points));
  }

  return shapes;
}

async function readKeyValue(file: string, keyColumn: string, valueColumn: string) {
  const values = new Map<string, string>();
  await streamCsv(file, (row) => {
    const key = row[keyColumn];
    const value = row[valueColumn];
    if (key && value) values.set(key, value);
  });
  return values;
}

export async function readGtfsFeed(dir: string, distanceScale = 1): Promise<GtfsFeed> {
  const shapes = await readShapes(dir, distanceScale);
  const tripShapes = await readKeyValue(path.join(dir, "trips.txt"), "trip_id", "shape_id");
  const stopNames = await readKeyValue(path.join(dir, "stops.txt"), "stop_id", "stop_name");

  const stopTimes = new Map<string, Array<{ sequence: number; stop: TripStop }>>();
  await streamCsv(path.join(dir, "stop_times.txt"), (row) => {
    const tripId = row.trip_id;
    const stationName = row.stop_id ? stopNames.get(row.stop_id) : undefined;
    if (!tripId || !stationName || !tripShapes.has(tripId)) return;

    const entries = stopTimes.get(tripId) ?? [];
    entries.push({
      sequence: toNumber(row.stop_sequence),
      stop: { stationName, distance: toNumber(row.shape_dist_traveled) * distanceScale },
    });
    stopTimes.set(tripId, entries);
  });

  const trips: GtfsTrip[] = [];
  for (const [tripId, shapeId] of tripShapes) {
    const entries = stopTimes.get(tripId);
    if (!entries || !shapes.has(shapeId)) continue;

    const stops = entries
      .sort((a, b) => a.sequence - b.sequence)
      .map((entry) => entry.stop);
    if (stops.some((stop) => !Number.isFinite(stop.distance))) continue;

    trips.push({ tripId, shapeId, stops });
  }

  return { shapes, trips };
}

export async function readStationTable(file: string): Promise<Map<string, number>> {
  const table = new Map<string, number>();
  await streamCsv(file, (row) => {
    const id = Number.parseInt(row.EVA_NR ?? row.eva ?? "", 10);
    const name = (row.NAME ?? row.name)?.trim();
    if (name && Number.isInteger(id)) table.set(name, id);
  });
  return table;
}

function toPolylinePoint(entry: unknown): PolylinePoint | null {
  if (!entry || typeof entry !== "object") return null;
  const lat = "lat" in entry ? Number(entry.lat) : Number.NaN;
  const lon = "lon" in entry ? Number(entry.lon) : Number.NaN;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;

  const rawId = "stationId" in entry ? entry.stationId : null;
  const stationId = rawId === null || rawId === undefined ? Number.NaN : Number(rawId);
  return { lat, lon, stationId: Number.isInteger(stationId) ? stationId : null };
}

export function parsePolylineDump(raw: unknown): PolylinePoint[][] {
  if (!Array.isArray(raw)) return [];

  const polylines: PolylinePoint[][] = [];
  for (const line of raw) {
    if (!Array.isArray(line)) continue;
    const points: PolylinePoint[] = [];
    for (const entry of line) {
      const point = toPolylinePoint(entry);
      if (point) points.push(point);
    }
    if (points.length > 1) polylines.push(points);
  }
  return polylines;
}

export async function readPolylineDump(file: string): Promise<PolylinePoint[][]> {
  const text = await fs.promises.readFile(file, "utf8");
  return parsePolylineDump(JSON.parse(text));
}
