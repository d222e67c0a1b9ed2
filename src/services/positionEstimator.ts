import type {
  ArrivalRecord,
  CandidateEstimate,
  CandidateRejectReason,
  GeoPoint,
  LegMetric,
  NormalizedStopover,
  RankedCandidates,
  StopoverEvent,
  TrainCandidate,
} from "../types";
import { closestLegIndex, haversineKm, lerpPoint } from "../utils/geo";
import { clamp } from "../utils/numbers";

export type MergeDetections = (detections: TrainCandidate[]) => TrainCandidate;

export type EstimatorOptions = {
  maxDistanceKm: number;
  maxResults: number;
  startGraceMs: number;
  legMetric: LegMetric;
  mergeDetections?: MergeDetections;
};

type Leg = {
  from: NormalizedStopover;
  to: NormalizedStopover;
};

export const MIN_CANDIDATE_STOPOVERS = 2;

function adjustTime(
  planned: number | null,
  actual: number | null,
  delayMs: number,
): number | null {
  if (actual !== null && actual !== planned) return actual;
  if (planned !== null) return planned + delayMs;
  return actual;
}

export function normalizeStopover(
  stopover: StopoverEvent,
  delaySeconds: number | null,
): NormalizedStopover | null {
  const location = stopover.station.location;
  if (!location) return null;

  const delayMs = (delaySeconds ?? 0) * 1000;
  return {
    station: { ...stopover.station, location },
    arrival: adjustTime(stopover.plannedArrival, stopover.arrival, delayMs),
    departure: adjustTime(stopover.plannedDeparture, stopover.departure, delayMs),
  };
}

/**
 * Previous stopovers followed by the queried station itself, whose arrival
 * comes straight from the live record.
 */
export function buildStopoverChain(record: ArrivalRecord): NormalizedStopover[] {
  const chain: NormalizedStopover[] = [];

  for (const stopover of record.previousStopovers) {
    const normalized = normalizeStopover(stopover, record.delaySeconds);
    if (normalized) chain.push(normalized);
  }

  const target = normalizeStopover(
    {
      station: record.station,
      plannedArrival: record.plannedWhen,
      arrival: record.when,
      plannedDeparture: null,
      departure: null,
    },
    record.delaySeconds,
  );
  if (target) chain.push(target);

  return chain;
}

/** Live departure from the trip's first reported stopover, located or not. */
export function tripStartTime(record: ArrivalRecord): number | null {
  const [first] = record.previousStopovers;
  if (!first) return null;
  const delayMs = (record.delaySeconds ?? 0) * 1000;
  return (
    adjustTime(first.plannedDeparture, first.departure, delayMs) ??
    adjustTime(first.plannedArrival, first.arrival, delayMs)
  );
}

function departureTime(stopover: NormalizedStopover): number | null {
  return stopover.departure ?? stopover.arrival;
}

function arrivalTime(stopover: NormalizedStopover): number | null {
  return stopover.arrival ?? stopover.departure;
}

export function progressRatio(now: number, departure: number, arrival: number): number {
  const total = arrival - departure;
  if (total <= 0) return now >= arrival ? 1 : 0;
  return clamp(1 - (arrival - now) / total, 0, 1);
}

export function likelihood(distanceKm: number, maxDistanceKm: number): number {
  return 100 - (100 * distanceKm) / maxDistanceKm;
}

export function countCandidateStations(
  record: ArrivalRecord,
  candidateStations: Set<number>,
): number {
  let count = 0;
  for (const stopover of record.previousStopovers) {
    if (candidateStations.has(stopover.station.id)) count += 1;
  }
  return count;
}

export function estimateCandidate(
  record: ArrivalRecord,
  query: GeoPoint,
  candidateStations: Set<number>,
  now: number,
  options: EstimatorOptions,
): CandidateEstimate {
  const rejected = (reason: CandidateRejectReason): CandidateEstimate => ({
    status: "rejected",
    reason,
    tripId: record.tripId,
  });

  if (countCandidateStations(record, candidateStations) < MIN_CANDIDATE_STOPOVERS) {
    return rejected("too_few_candidate_stations");
  }

  const chain = buildStopoverChain(record);
  if (chain.length < 2) return rejected("too_few_candidate_stations");

  const startedAt = tripStartTime(record);
  if (startedAt !== null && startedAt > now + options.startGraceMs) {
    return rejected("not_started");
  }

  const legs: Leg[] = [];
  for (let i = 1; i < chain.length; i += 1) {
    legs.push({ from: chain[i - 1], to: chain[i] });
  }

  const traversalIndex = legs.findIndex((leg) => {
    const target = arrivalTime(leg.to);
    return target !== null && target > now;
  });
  if (traversalIndex === -1) return rejected("already_arrived");

  const closestIndex = closestLegIndex(
    query,
    legs.map((leg) => ({ from: leg.from.station.location, to: leg.to.station.location })),
    options.legMetric,
  );
  if (closestIndex !== traversalIndex) return rejected("not_closest_leg");

  const leg = legs[traversalIndex];
  const legArrival = arrivalTime(leg.to) ?? now;
  const legDeparture = departureTime(leg.from) ?? legArrival;
  const ratio = progressRatio(now, legDeparture, legArrival);

  const from = leg.from.station.location;
  const to = leg.to.station.location;
  // Straight-line position between the two stops. Legs of 20 km and more
  // would need route-following to do better; they keep this location as well.
  const location = lerpPoint(from, to, ratio);

  const distanceKm = haversineKm(location, query);

  return {
    status: "located",
    candidate: {
      tripId: record.tripId,
      lineName: record.lineName,
      trainNumber: record.trainNumber,
      stopovers: chain,
      previous: leg.from,
      next: leg.to,
      progressRatio: ratio,
      location,
      distanceKm,
      likelihood: likelihood(distanceKm, options.maxDistanceKm),
      preferred: leg.to.station.id === record.station.id,
    },
  };
}

export const keepBestDetection: MergeDetections = (detections) =>
  detections.find((candidate) => candidate.preferred) ?? detections[0];

function trainKey(candidate: TrainCandidate): string {
  return candidate.trainNumber || candidate.tripId;
}

export function rankCandidates(
  candidates: TrainCandidate[],
  options: Pick<EstimatorOptions, "maxDistanceKm" | "maxResults" | "mergeDetections">,
): RankedCandidates {
  const merge = options.mergeDetections ?? keepBestDetection;
  const byDistance = [...candidates].sort((a, b) => a.distanceKm - b.distanceKm);

  const groups = new Map<string, TrainCandidate[]>();
  for (const candidate of byDistance) {
    const key = trainKey(candidate);
    const group = groups.get(key);
    if (group) group.push(candidate);
    else groups.set(key, [candidate]);
  }

  const dropped: RankedCandidates["dropped"] = [];
  const survivors: TrainCandidate[] = [];

  for (const group of groups.values()) {
    const kept = merge(group);
    survivors.push(kept);
    for (const candidate of group) {
      if (candidate !== kept) dropped.push({ candidate, reason: "dedup" });
    }
  }

  const inRange: TrainCandidate[] = [];
  for (const candidate of survivors) {
    if (candidate.distanceKm >= options.maxDistanceKm) {
      dropped.push({ candidate, reason: "distance" });
    } else {
      inRange.push(candidate);
    }
  }

  inRange.sort((a, b) => a.distanceKm - b.distanceKm);

  return {
    emitted: inRange.slice(0, options.maxResults),
    dropped,
  };
}
