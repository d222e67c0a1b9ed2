import type { ArrivalRecord, CandidateStationSet, Station, StopoverEvent } from "../types";
import { cellKey, cellWindow } from "../utils/grid";

export const NOW = Date.UTC(2024, 4, 1, 10, 0, 0);
export const MINUTE = 60 * 1000;

export const ZULU: Station = { id: 3, name: "Zulu", location: { lat: 50.0, lon: 7.8 } };
export const ALPHA: Station = { id: 1, name: "Alpha", location: { lat: 50.0, lon: 8.0 } };
export const BETA: Station = { id: 2, name: "Beta", location: { lat: 50.0, lon: 8.2 } };
export const GAMMA: Station = { id: 4, name: "Gamma", location: { lat: 50.0, lon: 8.4 } };

export function stopover(
  station: Station,
  times: Partial<Omit<StopoverEvent, "station">>,
): StopoverEvent {
  return {
    station,
    plannedArrival: times.plannedArrival ?? null,
    arrival: times.arrival ?? null,
    plannedDeparture: times.plannedDeparture ?? null,
    departure: times.departure ?? null,
  };
}

/**
 * Zulu -> Alpha -> Beta, queried at Beta. Left Alpha ten minutes ago (two
 * minutes late), due at Beta in ten minutes.
 */
export function arrivalAtBeta(overrides: Partial<ArrivalRecord> = {}): ArrivalRecord {
  return {
    tripId: "trip-101",
    lineName: "ICE 101",
    trainNumber: "101",
    station: BETA,
    plannedWhen: NOW + 8 * MINUTE,
    when: NOW + 10 * MINUTE,
    delaySeconds: 120,
    previousStopovers: [
      stopover(ZULU, { plannedDeparture: NOW - 30 * MINUTE, departure: NOW - 28 * MINUTE }),
      stopover(ALPHA, {
        plannedArrival: NOW - 14 * MINUTE,
        plannedDeparture: NOW - 12 * MINUTE,
        departure: NOW - 12 * MINUTE,
      }),
    ],
    ...overrides,
  };
}

export function lookupIndex(
  index: CandidateStationSet,
  lat: number,
  lon: number,
  radius = 3,
): Set<number> {
  const stations = new Set<number>();
  for (const cell of cellWindow(lat, lon, radius)) {
    for (const id of index.get(cellKey(cell)) ?? []) stations.add(id);
  }
  return stations;
}

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
