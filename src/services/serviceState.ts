import Redis from "ioredis";
import type { StatsSnapshot } from "../types";
import {
  IndexStoreFatalError,
  IndexStoreTransientError,
  errorMessage,
} from "../utils/errors";
import { createIndexStore, type IndexStore } from "./indexStore";
import type { RequestCounters } from "./upstreamClient";

export type IndexStoreConnection = {
  store: IndexStore;
  close: () => Promise<void>;
};

export type IndexStoreConnector = () => Promise<IndexStoreConnection>;

type ClosingResponse = {
  once(event: "close", listener: () => void): unknown;
};

type KeydbConnectorOptions = {
  url: string;
  clientName: string;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  keyPrefix: string;
  windowCells: number;
};

export function createKeydbConnector(options: KeydbConnectorOptions): IndexStoreConnector {
  return async () => {
    const keydb = new Redis(options.url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: options.connectTimeoutMs,
      commandTimeout: options.commandTimeoutMs,
      // Reconnects are driven by ServiceState, one attempt per query.
      retryStrategy: () => null,
    });
    keydb.on("error", (error: Error) => {
      console.warn("[index-store] keydb error", error.message);
    });

    try {
      await keydb.connect();
      await keydb.client("SETNAME", options.clientName);
      await keydb.ping();
    } catch (error) {
      keydb.disconnect();
      throw error;
    }

    return {
      store: createIndexStore({
        keydb,
        keyPrefix: options.keyPrefix,
        windowCells: options.windowCells,
      }),
      close: async () => {
        try {
          await keydb.quit();
        } catch (error) {
          console.warn("[index-store] quit failed, disconnecting", errorMessage(error));
          keydb.disconnect();
        }
      },
    };
  };
}

type ServiceStateOptions = {
  connect: IndexStoreConnector;
  onFatal?: (error: IndexStoreFatalError) => void;
};

/**
 * Owns the index store connection and the request counters for the lifetime
 * of one service process.
 */
export class ServiceState {
  #connect: IndexStoreConnector;
  #onFatal: (error: IndexStoreFatalError) => void;
  #connection: IndexStoreConnection | null = null;
  #connecting: Promise<IndexStoreConnection> | null = null;
  #arrivalsRequestCount = 0;
  #polylineRequestCount = 0;
  #stopped = false;

  readonly counters: RequestCounters = {
    recordArrivalsRequest: () => {
      this.#arrivalsRequestCount += 1;
    },
    recordPolylineRequest: () => {
      this.#polylineRequestCount += 1;
    },
  };

  constructor(options: ServiceStateOptions) {
    this.#connect = options.connect;
    this.#onFatal =
      options.onFatal ??
      ((error) => {
        console.error("[service] index store unreachable, exiting", {
          error: error.message,
        });
        process.exit(1);
      });
  }

  async start(): Promise<void> {
    this.#stopped = false;
    await this.#getConnection();
    console.log("[service] index store connected");
  }

  async stop(): Promise<void> {
    this.#stopped = true;
    const connection = this.#connection;
    this.#connection = null;
    if (connection) await connection.close();
  }

  stats(): StatsSnapshot {
    return {
      arrivals_request_count: this.#arrivalsRequestCount,
      polyline_request_count: this.#polylineRequestCount,
    };
  }

  async lookupCandidates(lat: number, lon: number): Promise<Set<number>> {
    const connection = await this.#getConnection();
    try {
      return await connection.store.getCandidates(lat, lon);
    } catch (error) {
      throw await this.#markLost(connection, error);
    }
  }

  async currentIndexVersion(): Promise<string | null> {
    const connection = await this.#getConnection();
    try {
      return await connection.store.getCurrentVersion();
    } catch (error) {
      throw await this.#markLost(connection, error);
    }
  }

  fail(error: IndexStoreFatalError): void {
    this.#onFatal(error);
  }

  /** Escalates once the response has been flushed or abandoned. */
  failAfterClose(response: ClosingResponse, error: IndexStoreFatalError): void {
    response.once("close", () => this.fail(error));
  }

  async #getConnection(): Promise<IndexStoreConnection> {
    if (this.#stopped) {
      throw new IndexStoreTransientError("Service is shutting down");
    }

    if (this.#connection) return this.#connection;

    if (!this.#connecting) {
      this.#connecting = this.#connect();
    }

    try {
      const connection = await this.#connecting;
      this.#connection = connection;
      return connection;
    } catch (error) {
      throw new IndexStoreFatalError(
        `Index store connection failed: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      this.#connecting = null;
    }
  }

  async #markLost(
    connection: IndexStoreConnection,
    error: unknown,
  ): Promise<IndexStoreTransientError> {
    console.warn("[service] index store lookup failed, reconnecting on next query", {
      error: errorMessage(error),
    });

    // A connection already replaced or stopped was closed by whoever dropped it.
    if (this.#connection === connection) {
      this.#connection = null;
      await connection.close().catch((closeError: unknown) => {
        console.warn("[service] failed to close lost connection", errorMessage(closeError));
      });
    }

    return new IndexStoreTransientError(
      `Index store lookup failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
