import dotenv from "dotenv";
import type { LegMetric } from "../types";

dotenv.config();

export type AppConfig = {
  port: number;
  isProd: boolean;
  cors: {
    origin: string;
    methods: string[];
  };
  keydb: {
    url: string;
    clientName: string;
    connectTimeoutMs: number;
    commandTimeoutMs: number;
  };
  index: {
    keyPrefix: string;
    windowCells: number;
    staleVersionTtlSeconds: number;
    buildLockSeconds: number;
    batchSize: number;
    spacingMeters: number;
    shapeDistanceScale: number;
    gtfsDir: string;
    stationsFile: string;
    polylinesFile: string | null;
  };
  upstream: {
    baseUrl: string;
    timeoutMs: number;
    concurrency: number;
    arrivalsDurationMinutes: number;
    arrivalsResults: number;
  };
  estimator: {
    maxDistanceKm: number;
    maxResults: number;
    startGraceMs: number;
    legMetric: LegMetric;
  };
  displayTimezone: string;
  polylineDump: {
    stationIds: number[];
    outputFile: string;
  };
};

function readInt(name: string, fallback: number, min = 0): number {
  const value = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function readFloat(name: string, fallback: number): number {
  const value = Number.parseFloat(process.env[name] ?? "");
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function readLegMetric(raw: string | undefined): LegMetric {
  return raw?.trim().toLowerCase() === "perpendicular" ? "perpendicular" : "segment";
}

function readIdList(raw: string | undefined): number[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((entry) => Number.parseInt(entry.trim(), 10))
    .filter((id) => Number.isInteger(id) && id > 0);
}

export function loadConfig(): AppConfig {
  return {
    port: readInt("PORT", 8080, 1),
    isProd: process.env.ENVIROMENT === "prod",
    cors: {
      origin: process.env.CORS_ORIGIN ?? "*",
      methods: ["GET"],
    },
    keydb: {
      url: process.env.KEYDB_URL ?? "redis://127.0.0.1:6379",
      clientName: process.env.KEYDB_CLIENT_NAME ?? "train_locator",
      connectTimeoutMs: readInt("KEYDB_CONNECT_TIMEOUT_MS", 3000, 1),
      commandTimeoutMs: readInt("KEYDB_COMMAND_TIMEOUT_MS", 2000, 1),
    },
    index: {
      keyPrefix: process.env.INDEX_KEY_PREFIX ?? "train-index",
      windowCells: readInt("INDEX_WINDOW_CELLS", 3),
      staleVersionTtlSeconds: readInt("INDEX_STALE_VERSION_TTL_SECONDS", 120, 1),
      buildLockSeconds: readInt("INDEX_BUILD_LOCK_SECONDS", 3600, 1),
      batchSize: readInt("INDEX_BATCH_SIZE", 1000, 1),
      spacingMeters: readFloat("INDEX_SPACING_METERS", 100),
      shapeDistanceScale: readFloat("INDEX_SHAPE_DISTANCE_SCALE", 1),
      gtfsDir: process.env.INDEX_GTFS_DIR ?? "./data/gtfs",
      stationsFile: process.env.INDEX_STATIONS_FILE ?? "./data/stations.csv",
      polylinesFile: process.env.INDEX_POLYLINES_FILE || null,
    },
    upstream: {
      baseUrl: process.env.UPSTREAM_BASE_URL ?? "https://v6.db.transport.rest",
      timeoutMs: readInt("UPSTREAM_TIMEOUT_MS", 10000, 1),
      concurrency: readInt("UPSTREAM_CONCURRENCY", 1, 1),
      arrivalsDurationMinutes: readInt("UPSTREAM_ARRIVALS_DURATION_MINUTES", 60, 1),
      arrivalsResults: readInt("UPSTREAM_ARRIVALS_RESULTS", 40, 1),
    },
    estimator: {
      maxDistanceKm: readFloat("MAX_DISTANCE_KM", 50),
      maxResults: readInt("MAX_RESULTS", 10, 1),
      startGraceMs: readInt("START_GRACE_MS", 5 * 60 * 1000),
      legMetric: readLegMetric(process.env.LEG_METRIC),
    },
    displayTimezone: process.env.DISPLAY_TIMEZONE ?? "Europe/Berlin",
    polylineDump: {
      stationIds: readIdList(process.env.POLYLINE_STATIONS),
      outputFile: process.env.POLYLINE_OUTPUT_FILE ?? "./data/polylines.json",
    },
  };
}

const config = loadConfig();

export default config;
