import axios, { type AxiosInstance } from "axios";
import type {
  ArrivalRecord,
  GeoPoint,
  PolylinePoint,
  Station,
  StopoverEvent,
} from "../types";
import { UpstreamFetchError, errorMessage } from "../utils/errors";
import { parseTimestamp } from "../utils/time";

export type RequestCounters = {
  recordArrivalsRequest: () => void;
  recordPolylineRequest: () => void;
};

export type UpstreamClient = {
  fetchArrivals: (stationId: number) => Promise<ArrivalRecord[]>;
  fetchTripPolyline: (tripId: string) => Promise<PolylinePoint[]>;
};

type UpstreamClientOptions = {
  baseUrl: string;
  timeoutMs: number;
  arrivalsDurationMinutes: number;
  arrivalsResults: number;
  counters: RequestCounters;
  http?: AxiosInstance;
};

// Raw payloads of the hafas-style REST source; every field is optional.
type RawLocation = {
  latitude?: number | null;
  longitude?: number | null;
};

type RawStop = {
  id?: string | number;
  name?: string;
  location?: RawLocation | null;
};

type RawStopover = {
  stop?: RawStop;
  arrival?: string | null;
  plannedArrival?: string | null;
  departure?: string | null;
  plannedDeparture?: string | null;
};

type RawArrival = {
  tripId?: string;
  stop?: RawStop;
  when?: string | null;
  plannedWhen?: string | null;
  delay?: number | null;
  line?: {
    name?: string;
    fahrtNr?: string | number;
  };
  previousStopovers?: RawStopover[];
};

type RawFeature = {
  properties?: { type?: string; id?: string | number } | null;
  geometry?: { type?: string; coordinates?: number[] };
};

type RawTrip = {
  polyline?: { features?: RawFeature[] };
};

// Newer deployments wrap the trip in `{ trip }`.
type RawTripResponse = RawTrip & { trip?: RawTrip };

function toLocation(raw: RawLocation | null | undefined): GeoPoint | null {
  const lat = raw?.latitude;
  const lon = raw?.longitude;
  if (typeof lat !== "number" || typeof lon !== "number") return null;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return null;
  return { lat, lon };
}

function toStationId(raw: string | number | undefined): number | null {
  if (raw === undefined) return null;
  const id = Number.parseInt(String(raw), 10);
  return Number.isInteger(id) ? id : null;
}

function toStation(raw: RawStop | undefined): Station | null {
  const id = toStationId(raw?.id);
  if (id === null) return null;
  return {
    id,
    name: raw?.name ?? String(id),
    location: toLocation(raw?.location),
  };
}

function toStopover(raw: RawStopover): StopoverEvent | null {
  const station = toStation(raw.stop);
  if (!station) return null;
  return {
    station,
    plannedArrival: parseTimestamp(raw.plannedArrival),
    arrival: parseTimestamp(raw.arrival),
    plannedDeparture: parseTimestamp(raw.plannedDeparture),
    departure: parseTimestamp(raw.departure),
  };
}

export function parseArrival(raw: RawArrival, stationId: number): ArrivalRecord | null {
  if (!raw.tripId) return null;

  const station = toStation(raw.stop) ?? { id: stationId, name: String(stationId), location: null };
  const previousStopovers: StopoverEvent[] = [];
  for (const entry of raw.previousStopovers ?? []) {
    const stopover = toStopover(entry);
    if (stopover) previousStopovers.push(stopover);
  }

  return {
    tripId: raw.tripId,
    lineName: raw.line?.name ?? "",
    trainNumber: raw.line?.fahrtNr === undefined ? "" : String(raw.line.fahrtNr),
    station,
    plannedWhen: parseTimestamp(raw.plannedWhen),
    when: parseTimestamp(raw.when),
    delaySeconds: typeof raw.delay === "number" && Number.isFinite(raw.delay) ? raw.delay : null,
    previousStopovers,
  };
}

function extractArrivals(data: unknown): RawArrival[] {
  if (Array.isArray(data)) return data;
  if (data && typeof data === "object" && "arrivals" in data && Array.isArray(data.arrivals)) {
    return data.arrivals;
  }
  return [];
}

export function parsePolyline(trip: RawTrip): PolylinePoint[] {
  const points: PolylinePoint[] = [];

  for (const feature of trip.polyline?.features ?? []) {
    const coordinates = feature.geometry?.coordinates;
    if (!coordinates || coordinates.length < 2) continue;

    const [lon, lat] = coordinates;
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) continue;

    const isStop = feature.properties?.type === "stop";
    points.push({
      lat,
      lon,
      stationId: isStop ? toStationId(feature.properties?.id) : null,
    });
  }

  return points;
}

export function createUpstreamClient(options: UpstreamClientOptions): UpstreamClient {
  const http =
    options.http ??
    axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { Accept: "application/json" },
    });

  async function fetchArrivals(stationId: number): Promise<ArrivalRecord[]> {
    options.counters.recordArrivalsRequest();

    try {
      const response = await http.get<unknown>(`/stops/${stationId}/arrivals`, {
        params: {
          duration: options.arrivalsDurationMinutes,
          results: options.arrivalsResults,
          stopovers: true,
          remarks: false,
          linesOfStops: false,
        },
        timeout: options.timeoutMs,
      });

      const records: ArrivalRecord[] = [];
      for (const raw of extractArrivals(response.data)) {
        const record = parseArrival(raw, stationId);
        if (record) records.push(record);
      }
      return records;
    } catch (error) {
      const status = axios.isAxiosError(error) ? (error.response?.status ?? null) : null;
      throw new UpstreamFetchError(stationId, errorMessage(error), status);
    }
  }

  async function fetchTripPolyline(tripId: string): Promise<PolylinePoint[]> {
    options.counters.recordPolylineRequest();

    const response = await http.get<RawTripResponse>(
      `/trips/${encodeURIComponent(tripId)}`,
      {
        params: { polyline: true, stopovers: false, remarks: false },
        timeout: options.timeoutMs,
      },
    );

    return parsePolyline(response.data.trip ?? response.data);
  }

  return { fetchArrivals, fetchTripPolyline };
}
