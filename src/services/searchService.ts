import type {
  ArrivalRecord,
  CandidateRejectReason,
  GeoPoint,
  SearchResponse,
  TrainCandidate,
  TrainSummary,
} from "../types";
import { InputValidationError, errorMessage } from "../utils/errors";
import { roundTo } from "../utils/numbers";
import { formatClock } from "../utils/time";
import { fetchStationArrivals } from "./arrivalFetcher";
import {
  estimateCandidate,
  rankCandidates,
  type EstimatorOptions,
} from "./positionEstimator";

type SearchServiceOptions = {
  getCandidates: (lat: number, lon: number) => Promise<Set<number>>;
  fetchArrivals: (stationId: number) => Promise<ArrivalRecord[]>;
  estimator: EstimatorOptions;
  upstreamConcurrency: number;
  displayTimezone: string;
  now?: () => number;
};

export type SearchService = {
  search: (query: GeoPoint) => Promise<SearchResponse>;
  locateTrains: (
    query: GeoPoint,
    candidateStations: Set<number>,
    records: ArrivalRecord[],
    now: number,
  ) => TrainCandidate[];
};

export function createSearchService(options: SearchServiceOptions): SearchService {
  const now = options.now ?? Date.now;

  function toSummary(candidate: TrainCandidate): TrainSummary {
    const { previous, next } = candidate;
    return {
      line: candidate.lineName,
      train: candidate.trainNumber,
      tripId: candidate.tripId,
      location: [roundTo(candidate.location.lat, 6), roundTo(candidate.location.lon, 6)],
      distance: roundTo(candidate.distanceKm, 1),
      likelihood: Math.round(candidate.likelihood),
      stops: [
        [
          previous.station.id,
          previous.station.name,
          formatClock(previous.departure ?? previous.arrival, options.displayTimezone),
        ],
        [
          next.station.id,
          next.station.name,
          formatClock(next.arrival ?? next.departure, options.displayTimezone),
        ],
      ],
    };
  }

  function locateTrains(
    query: GeoPoint,
    candidateStations: Set<number>,
    records: ArrivalRecord[],
    at: number,
  ): TrainCandidate[] {
    const located: TrainCandidate[] = [];
    const rejections: Partial<Record<CandidateRejectReason, number>> = {};

    for (const record of records) {
      const estimate = estimateCandidate(record, query, candidateStations, at, options.estimator);
      if (estimate.status === "located") {
        located.push(estimate.candidate);
      } else {
        rejections[estimate.reason] = (rejections[estimate.reason] ?? 0) + 1;
      }
    }

    const ranked = rankCandidates(located, options.estimator);
    if (records.length > 0) {
      console.log("[search] candidates", {
        records: records.length,
        located: located.length,
        emitted: ranked.emitted.length,
        dropped: ranked.dropped.length,
        rejections,
      });
    }

    return ranked.emitted;
  }

  async function search(query: GeoPoint): Promise<SearchResponse> {
    if (!Number.isFinite(query.lat) || !Number.isFinite(query.lon)) {
      throw new InputValidationError("Query coordinates must be finite numbers");
    }

    const candidateStations = await options.getCandidates(query.lat, query.lon);
    const evas = Array.from(candidateStations).sort((a, b) => a - b);
    if (evas.length === 0) return { evas, trains: [] };

    const outcomes = await fetchStationArrivals(
      evas,
      options.fetchArrivals,
      options.upstreamConcurrency,
    );

    const records: ArrivalRecord[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        records.push(...outcome.records);
      } else {
        console.warn("[search] station fetch failed", {
          stationId: outcome.stationId,
          error: errorMessage(outcome.error),
        });
      }
    }

    const trains = locateTrains(query, candidateStations, records, now()).map(toSummary);
    return { evas, trains };
  }

  return { search, locateTrains };
}
