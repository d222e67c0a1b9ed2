import fs from "fs";
import path from "path";
import config from "../config";
import { fetchStationArrivals } from "../services/arrivalFetcher";
import { createUpstreamClient } from "../services/upstreamClient";
import type { PolylinePoint } from "../types";
import { errorMessage } from "../utils/errors";

async function main(): Promise<void> {
  const stationIds = config.polylineDump.stationIds;
  if (stationIds.length === 0) {
    throw new Error("POLYLINE_STATIONS must list at least one station id");
  }

  const counters = { arrivals: 0, polylines: 0 };
  const upstream = createUpstreamClient({
    ...config.upstream,
    counters: {
      recordArrivalsRequest: () => {
        counters.arrivals += 1;
      },
      recordPolylineRequest: () => {
        counters.polylines += 1;
      },
    },
  });

  const outcomes = await fetchStationArrivals(
    stationIds,
    upstream.fetchArrivals,
    config.upstream.concurrency,
  );

  const tripIds = new Set<string>();
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      console.warn("[polylines] arrivals failed", {
        stationId: outcome.stationId,
        error: errorMessage(outcome.error),
      });
      continue;
    }
    for (const record of outcome.records) tripIds.add(record.tripId);
  }

  const polylines: PolylinePoint[][] = [];
  for (const tripId of tripIds) {
    try {
      const points = await upstream.fetchTripPolyline(tripId);
      if (points.some((point) => point.stationId !== null)) polylines.push(points);
    } catch (error) {
      console.warn("[polylines] trip polyline failed", { tripId, error: errorMessage(error) });
    }
  }

  const outputFile = config.polylineDump.outputFile;
  await fs.promises.mkdir(path.dirname(outputFile), { recursive: true });
  await fs.promises.writeFile(outputFile, JSON.stringify(polylines));

  console.log("[polylines] dump written", {
    outputFile,
    trips: tripIds.size,
    polylines: polylines.length,
    arrivalsRequests: counters.arrivals,
    polylineRequests: counters.polylines,
  });
}

main().catch((error: unknown) => {
  console.error("[polylines] dump failed", errorMessage(error));
  process.exit(1);
});
