import axios, { type AxiosInstance } from "axios";
import http from "http";
import { createServer } from "../server";
import type { IndexStore } from "../services/indexStore";
import type { SearchService } from "../services/searchService";
import { ServiceState } from "../services/serviceState";
import type { GeoPoint, SearchResponse } from "../types";
import {
  IndexStoreFatalError,
  IndexStoreTransientError,
  InputValidationError,
} from "../utils/errors";
import { silenceConsole } from "./helpers";

const store: IndexStore = {
  getCandidates: async () => new Set([8000105]),
  getCurrentVersion: async () => "1714557600000",
};

const search = jest.fn<Promise<SearchResponse>, [GeoPoint]>();
const onFatal = jest.fn();
const state = new ServiceState({
  connect: async () => ({ store, close: async () => undefined }),
  onFatal,
});
const searchService: SearchService = { search, locateTrains: jest.fn() };

async function untilCalled(mock: jest.Mock): Promise<void> {
  for (let attempt = 0; attempt < 50 && mock.mock.calls.length === 0; attempt += 1) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

let server: http.Server;
let client: AxiosInstance;

beforeAll(async () => {
  const app = createServer({
    state,
    searchService,
    cors: { origin: "*", methods: ["GET"] },
    isProd: false,
    logRequests: false,
  });
  server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));

  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  client = axios.create({
    baseURL: `http://127.0.0.1:${address.port}`,
    validateStatus: () => true,
    httpAgent: new http.Agent({ keepAlive: false }),
  });
});

afterAll(async () => {
  await state.stop();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  silenceConsole();
  search.mockReset();
  onFatal.mockReset();
});

afterEach(() => jest.restoreAllMocks());

describe("GET /search", () => {
  test("rejects a missing coordinate with a plain-text message", async () => {
    const response = await client.get("/search", { params: { lon: 8.6 } });

    expect(response.status).toBe(400);
    expect(response.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(response.data).toBe("Missing query parameter: lat");
    expect(search).not.toHaveBeenCalled();
  });

  test("lists every invalid coordinate", async () => {
    const response = await client.get("/search?lat=abc&lon=181");

    expect(response.status).toBe(400);
    expect(response.data).toBe(
      "Query parameter lat must be a number between -90 and 90\n" +
        "Query parameter lon must be a number between -180 and 180",
    );
  });

  test("returns the search result with an open CORS header", async () => {
    const result: SearchResponse = {
      evas: [8000105],
      trains: [
        {
          line: "ICE 101",
          train: "101",
          tripId: "trip-101",
          location: [50.1, 8.66],
          distance: 0.4,
          likelihood: 99,
          stops: [
            [8000105, "Alpha", "09:50"],
            [8000106, "Beta", "10:10"],
          ],
        },
      ],
    };
    search.mockResolvedValue(result);

    const response = await client.get("/search?lat=50.107&lon=8.663");

    expect(response.status).toBe(200);
    expect(response.headers["access-control-allow-origin"]).toBe("*");
    expect(response.data).toEqual(result);
    expect(search).toHaveBeenCalledWith({ lat: 50.107, lon: 8.663 });
  });

  test("answers a lost index store connection with a degraded response", async () => {
    search.mockRejectedValue(new IndexStoreTransientError("Index store lookup failed"));

    const response = await client.get("/search?lat=50&lon=8");

    expect(response.status).toBe(503);
    expect(response.data).toEqual({ error: "INDEX_STORE_UNAVAILABLE", evas: [], trains: [] });
    expect(onFatal).not.toHaveBeenCalled();
  });

  test("escalates an unreachable index store after answering", async () => {
    const error = new IndexStoreFatalError("Index store connection failed");
    search.mockRejectedValue(error);

    const response = await client.get("/search?lat=50&lon=8");

    expect(response.status).toBe(503);
    expect(response.data).toEqual({ error: "INDEX_STORE_UNAVAILABLE", evas: [], trains: [] });
    await untilCalled(onFatal);
    expect(onFatal).toHaveBeenCalledWith(error);
  });

  test("reports coordinates the search service refuses as a bad request", async () => {
    search.mockRejectedValue(new InputValidationError("Query coordinates must be finite numbers"));

    const response = await client.get("/search?lat=50&lon=8");

    expect(response.status).toBe(400);
    expect(response.data).toBe("Query coordinates must be finite numbers");
  });

  test("hides unexpected failures behind a generic error", async () => {
    search.mockRejectedValue(new TypeError("boom"));

    const response = await client.get("/search?lat=50&lon=8");

    expect(response.status).toBe(500);
    expect(response.data).toEqual({ error: "INTERNAL_ERROR", evas: [], trains: [] });
  });
});

describe("GET /stats", () => {
  test("reports the request counters", async () => {
    state.counters.recordArrivalsRequest();
    state.counters.recordArrivalsRequest();

    const response = await client.get("/stats");

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ arrivals_request_count: 2, polyline_request_count: 0 });
  });
});

describe("GET /health", () => {
  test("reports the published index version", async () => {
    const response = await client.get("/health");
    expect(response.data).toEqual({ status: "ok", indexVersion: "1714557600000" });
  });
});

test("unknown routes answer 404", async () => {
  const response = await client.get("/trains");
  expect(response.status).toBe(404);
  expect(response.data).toBe("Not found");
});
