export type GeoPoint = {
  lat: number;
  lon: number;
};

export type GridCell = {
  latIdx: number;
  lonIdx: number;
};

export type CandidateStationSet = Map<string, Set<number>>;

export type ShapePoint = GeoPoint & {
  distance: number;
};

export type TripStop = {
  stationName: string;
  distance: number;
};

export type PolylinePoint = GeoPoint & {
  stationId: number | null;
};

export type PolylineLeg = {
  fromStationId: number;
  toStationId: number;
  points: GeoPoint[];
};

export type Station = {
  id: number;
  name: string;
  location: GeoPoint | null;
};

export type StopoverEvent = {
  station: Station;
  plannedArrival: number | null;
  arrival: number | null;
  plannedDeparture: number | null;
  departure: number | null;
};

export type ArrivalRecord = {
  tripId: string;
  lineName: string;
  trainNumber: string;
  station: Station;
  plannedWhen: number | null;
  when: number | null;
  delaySeconds: number | null;
  previousStopovers: StopoverEvent[];
};

export type NormalizedStopover = {
  station: Station & { location: GeoPoint };
  arrival: number | null;
  departure: number | null;
};

export type TrainCandidate = {
  tripId: string;
  lineName: string;
  trainNumber: string;
  stopovers: NormalizedStopover[];
  previous: NormalizedStopover;
  next: NormalizedStopover;
  progressRatio: number;
  location: GeoPoint;
  distanceKm: number;
  likelihood: number;
  preferred: boolean;
};

export type CandidateRejectReason =
  | "too_few_candidate_stations"
  | "not_started"
  | "already_arrived"
  | "not_closest_leg";

export type CandidateEstimate =
  | { status: "located"; candidate: TrainCandidate }
  | { status: "rejected"; reason: CandidateRejectReason; tripId: string };

export type CandidateDropReason = "dedup" | "distance";

export type RankedCandidates = {
  emitted: TrainCandidate[];
  dropped: Array<{ candidate: TrainCandidate; reason: CandidateDropReason }>;
};

export type LegMetric = "segment" | "perpendicular";

export type TrainStop = [number, string, string];

export type TrainSummary = {
  line: string;
  train: string;
  tripId: string;
  location: [number, number];
  distance: number;
  likelihood: number;
  stops: [TrainStop, TrainStop];
};

export type SearchResponse = {
  evas: number[];
  trains: TrainSummary[];
  error?: string;
};

export type StatsSnapshot = {
  arrivals_request_count: number;
  polyline_request_count: number;
};
