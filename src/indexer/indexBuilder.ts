import type {
  CandidateStationSet,
  PolylinePoint,
  ShapePoint,
  TripStop,
} from "../types";
import { DataIntegrityError } from "../utils/errors";
import { cellKeyFor } from "../utils/grid";
import { splitPolylineIntoLegs } from "./polylineLegs";
import { densifyShape, resamplePath } from "./shapeDensifier";
import type { StationResolver } from "./stationResolver";

// Float noise from distance scaling must not count as leaving the bracket.
const DISTANCE_EPSILON = 1e-6;

export type BuildStats = {
  trips: number;
  skippedTrips: number;
  samples: number;
  polylineLegs: number;
  cells: number;
  unresolvedNames: number;
};

export type IndexBuilder = {
  addTrip: (tripId: string, shape: ShapePoint[], stops: TripStop[]) => void;
  addPolyline: (points: PolylinePoint[]) => void;
  build: () => CandidateStationSet;
  stats: () => BuildStats;
};

type IndexBuilderOptions = {
  spacingMeters: number;
  resolver: StationResolver;
};

export type StopBracket = [TripStop, TripStop];

/**
 * Pairs every sample with the two consecutive stops whose cumulative
 * distances enclose it. Samples and stops must both be ordered by distance.
 */
export function bracketSamples(
  tripId: string,
  samples: ShapePoint[],
  stops: TripStop[],
): StopBracket[] {
  if (stops.length < 2) return [];

  const first = stops[0].distance;
  const last = stops[stops.length - 1].distance;
  const brackets: StopBracket[] = [];
  let index = 0;

  for (const sample of samples) {
    if (sample.distance < first - DISTANCE_EPSILON || sample.distance > last + DISTANCE_EPSILON) {
      throw new DataIntegrityError(
        `Trip ${tripId}: shape sample at ${sample.distance} lies outside its stops (${first}..${last})`,
      );
    }

    while (index < stops.length - 2 && stops[index + 1].distance < sample.distance) {
      index += 1;
    }

    brackets.push([stops[index], stops[index + 1]]);
  }

  return brackets;
}

export function createIndexBuilder(options: IndexBuilderOptions): IndexBuilder {
  const index: CandidateStationSet = new Map();
  const densifiedShapes = new WeakMap<ShapePoint[], ShapePoint[]>();
  const counts = { trips: 0, skippedTrips: 0, samples: 0, polylineLegs: 0 };

  function register(lat: number, lon: number, stationIds: Array<number | null>): void {
    const key = cellKeyFor(lat, lon);
    let stations = index.get(key);

    for (const id of stationIds) {
      if (id === null) continue;
      if (!stations) {
        stations = new Set<number>();
        index.set(key, stations);
      }
      stations.add(id);
    }
  }

  function densified(shape: ShapePoint[]): ShapePoint[] {
    const cached = densifiedShapes.get(shape);
    if (cached) return cached;

    const samples = densifyShape(shape, options.spacingMeters);
    densifiedShapes.set(shape, samples);
    return samples;
  }

  function addTrip(tripId: string, shape: ShapePoint[], stops: TripStop[]): void {
    if (stops.length < 2 || shape.length === 0) {
      counts.skippedTrips += 1;
      return;
    }

    const samples = densified(shape);
    const brackets = bracketSamples(tripId, samples, stops);

    brackets.forEach(([from, to], i) => {
      const sample = samples[i];
      register(sample.lat, sample.lon, [
        options.resolver.resolve(from.stationName),
        options.resolver.resolve(to.stationName),
      ]);
    });

    counts.trips += 1;
    counts.samples += samples.length;
  }

  function addPolyline(points: PolylinePoint[]): void {
    for (const leg of splitPolylineIntoLegs(points)) {
      for (const vertex of resamplePath(leg.points, options.spacingMeters)) {
        register(vertex.lat, vertex.lon, [leg.fromStationId, leg.toStationId]);
      }
      counts.polylineLegs += 1;
    }
  }

  function stats(): BuildStats {
    return {
      ...counts,
      cells: index.size,
      unresolvedNames: options.resolver.unresolvedNames().length,
    };
  }

  return {
    addTrip,
    addPolyline,
    build: () => index,
    stats,
  };
}
