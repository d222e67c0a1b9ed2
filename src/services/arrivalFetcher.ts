import type { ArrivalRecord } from "../types";

export type StationFetchOutcome =
  | { stationId: number; ok: true; records: ArrivalRecord[] }
  | { stationId: number; ok: false; error: unknown };

/**
 * Fetches arrivals for each station with at most `concurrency` requests in
 * flight (one by default). A failing station yields a failure outcome and
 * never aborts the others. Outcomes keep the order of `stationIds`.
 */
export async function fetchStationArrivals(
  stationIds: number[],
  fetchArrivals: (stationId: number) => Promise<ArrivalRecord[]>,
  concurrency = 1,
): Promise<StationFetchOutcome[]> {
  const outcomes: StationFetchOutcome[] = new Array(stationIds.length);
  let cursor = 0;

  async function worker(): Promise<void> {
    while (cursor < stationIds.length) {
      const index = cursor;
      cursor += 1;
      const stationId = stationIds[index];

      try {
        const records = await fetchArrivals(stationId);
        outcomes[index] = { stationId, ok: true, records };
      } catch (error) {
        outcomes[index] = { stationId, ok: false, error };
      }
    }
  }

  const slots = Math.max(1, Math.min(concurrency, stationIds.length));
  await Promise.all(Array.from({ length: slots }, () => worker()));

  return outcomes;
}
