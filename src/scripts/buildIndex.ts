import Redis from "ioredis";
import config from "../config";
import { readGtfsFeed, readPolylineDump, readStationTable } from "../indexer/gtfsReader";
import { createIndexBuilder } from "../indexer/indexBuilder";
import { createStationResolver } from "../indexer/stationResolver";
import { createIndexStore } from "../services/indexStore";
import type { CandidateStationSet } from "../types";
import { classifyError, errorMessage } from "../utils/errors";

type BuildInputs = {
  gtfsDir: string;
  stationsFile: string;
  polylinesFile: string | null;
  spacingMeters: number;
  shapeDistanceScale: number;
};

export async function buildCandidateIndex(inputs: BuildInputs): Promise<CandidateStationSet> {
  const startedAt = Date.now();
  const stationTable = await readStationTable(inputs.stationsFile);
  const feed = await readGtfsFeed(inputs.gtfsDir, inputs.shapeDistanceScale);
  console.log("[indexer] inputs loaded", {
    stations: stationTable.size,
    shapes: feed.shapes.size,
    trips: feed.trips.length,
  });

  const resolver = createStationResolver(stationTable);
  const builder = createIndexBuilder({ spacingMeters: inputs.spacingMeters, resolver });

  for (const trip of feed.trips) {
    const shape = feed.shapes.get(trip.shapeId);
    if (!shape) continue;
    builder.addTrip(trip.tripId, shape, trip.stops);
  }

  if (inputs.polylinesFile) {
    const polylines = await readPolylineDump(inputs.polylinesFile);
    for (const polyline of polylines) {
      builder.addPolyline(polyline);
    }
  }

  console.log("[indexer] index built", {
    ...builder.stats(),
    durationMs: Date.now() - startedAt,
  });

  return builder.build();
}

async function main(): Promise<void> {
  const keydb = new Redis(config.keydb.url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    connectTimeout: config.keydb.connectTimeoutMs,
  });
  keydb.on("error", (error: Error) => {
    console.warn("[indexer] keydb error", error.message);
  });

  const store = createIndexStore({
    keydb,
    keyPrefix: config.index.keyPrefix,
    windowCells: config.index.windowCells,
    batchSize: config.index.batchSize,
    staleVersionTtlSeconds: config.index.staleVersionTtlSeconds,
    buildLockSeconds: config.index.buildLockSeconds,
  });

  try {
    await keydb.ping();
    if (!(await store.acquireBuildLock())) {
      throw new Error("Another index build holds the lock");
    }

    try {
      const index = await buildCandidateIndex(config.index);
      const result = await store.replaceIndex(index);
      console.log("[indexer] index published", result);
    } finally {
      await store.releaseBuildLock();
    }
  } finally {
    await keydb.quit().catch((error: unknown) => {
      console.warn("[indexer] quit failed, disconnecting", errorMessage(error));
      keydb.disconnect();
    });
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`[indexer] build aborted (${classifyError(error)})`, errorMessage(error));
    process.exit(1);
  });
}
