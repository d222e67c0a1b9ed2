import { chunk } from "lodash";
import type { CandidateStationSet } from "../types";
import { cellKey, cellWindow, DEFAULT_WINDOW_CELLS } from "../utils/grid";

export type IndexStore = {
  getCandidates: (lat: number, lon: number) => Promise<Set<number>>;
  getCurrentVersion: () => Promise<string | null>;
};

export type IndexWriter = IndexStore & {
  replaceIndex: (
    index: CandidateStationSet,
    version?: string,
  ) => Promise<{ version: string; cells: number; previousVersion: string | null }>;
  acquireBuildLock: () => Promise<boolean>;
  releaseBuildLock: () => Promise<void>;
};

// The ioredis commands the index store relies on.
export type IndexKeyValueClient = {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(
    key: string,
    value: string,
    mode: "EX",
    seconds: number,
    condition: "NX",
  ): Promise<"OK" | null>;
  hmget(key: string, ...fields: string[]): Promise<Array<string | null>>;
  hset(key: string, fields: Record<string, string>): Promise<number>;
  del(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
};

type IndexStoreOptions = {
  keydb: IndexKeyValueClient;
  keyPrefix: string;
  windowCells?: number;
  batchSize?: number;
  staleVersionTtlSeconds?: number;
  buildLockSeconds?: number;
};

export function parseStationIds(raw: string | null): number[] {
  if (!raw) return [];

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return [];
    return parsed
      .map((entry) => Number(entry))
      .filter((entry) => Number.isInteger(entry));
  } catch {
    return [];
  }
}

export function serializeStationIds(ids: Set<number>): string {
  return JSON.stringify(Array.from(ids).sort((a, b) => a - b));
}

export function createIndexStore(options: IndexStoreOptions): IndexWriter {
  const pointerKey = `${options.keyPrefix}:current`;
  const lockKey = `${options.keyPrefix}:build-lock`;
  const windowCells = options.windowCells ?? DEFAULT_WINDOW_CELLS;
  const batchSize = Math.max(1, options.batchSize ?? 1000);
  const staleVersionTtlSeconds = options.staleVersionTtlSeconds ?? 120;
  const lockToken = `${process.pid}:${Date.now()}`;

  function versionKey(version: string): string {
    return `${options.keyPrefix}:v:${version}`;
  }

  async function getCurrentVersion(): Promise<string | null> {
    return options.keydb.get(pointerKey);
  }

  async function getCandidates(lat: number, lon: number): Promise<Set<number>> {
    const version = await getCurrentVersion();
    const stations = new Set<number>();
    if (!version) return stations;

    const fields = cellWindow(lat, lon, windowCells).map(cellKey);
    const rows = await options.keydb.hmget(versionKey(version), ...fields);

    for (const row of rows) {
      for (const id of parseStationIds(row)) {
        stations.add(id);
      }
    }

    return stations;
  }

  async function replaceIndex(
    index: CandidateStationSet,
    version = String(Date.now()),
  ): Promise<{ version: string; cells: number; previousVersion: string | null }> {
    const targetKey = versionKey(version);
    const entries = Array.from(index.entries());

    try {
      await options.keydb.del(targetKey);
      for (const batch of chunk(entries, batchSize)) {
        const fields: Record<string, string> = {};
        for (const [key, ids] of batch) {
          fields[key] = serializeStationIds(ids);
        }
        await options.keydb.hset(targetKey, fields);
      }
    } catch (error) {
      await options.keydb.del(targetKey).catch((cleanupError: unknown) => {
        console.warn("[index-store] failed to drop partial version", {
          version,
          error: cleanupError,
        });
      });
      throw error;
    }

    const previousVersion = await options.keydb.get(pointerKey);
    await options.keydb.set(pointerKey, version);

    // Readers that resolved the old pointer keep it for a grace period.
    if (previousVersion && previousVersion !== version) {
      await options.keydb.expire(versionKey(previousVersion), staleVersionTtlSeconds);
    }

    return { version, cells: entries.length, previousVersion };
  }

  async function acquireBuildLock(): Promise<boolean> {
    const result = await options.keydb.set(
      lockKey,
      lockToken,
      "EX",
      options.buildLockSeconds ?? 3600,
      "NX",
    );
    return result === "OK";
  }

  async function releaseBuildLock(): Promise<void> {
    const holder = await options.keydb.get(lockKey);
    if (holder === lockToken) {
      await options.keydb.del(lockKey);
    }
  }

  return {
    getCandidates,
    getCurrentVersion,
    replaceIndex,
    acquireBuildLock,
    releaseBuildLock,
  };
}
