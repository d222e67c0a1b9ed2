import http from "http";
import config from "./config";
import { createServer } from "./server";
import { createSearchService } from "./services/searchService";
import { ServiceState, createKeydbConnector } from "./services/serviceState";
import { createUpstreamClient } from "./services/upstreamClient";
import { errorMessage } from "./utils/errors";

class App {
  static #instance: App;
  server: http.Server | undefined;
  status: "loading" | "running" | "error" | undefined = undefined;
  state = new ServiceState({
    connect: createKeydbConnector({
      ...config.keydb,
      keyPrefix: config.index.keyPrefix,
      windowCells: config.index.windowCells,
    }),
  });

  public static get instance(): App {
    if (!App.#instance) {
      App.#instance = new App();
    }
    return App.#instance;
  }

  async init() {
    this.status = "loading";
    try {
      await this.state.start();
    } catch (error) {
      console.error("[app] index store unavailable at startup", errorMessage(error));
      this.status = "error";
      process.exit(1);
    }
    await this.start_server();
  }

  async start_server() {
    if (this.server || this.status === "running") return;

    const upstream = createUpstreamClient({
      ...config.upstream,
      counters: this.state.counters,
    });
    const searchService = createSearchService({
      getCandidates: (lat, lon) => this.state.lookupCandidates(lat, lon),
      fetchArrivals: upstream.fetchArrivals,
      estimator: config.estimator,
      upstreamConcurrency: config.upstream.concurrency,
      displayTimezone: config.displayTimezone,
    });

    const app = createServer({
      state: this.state,
      searchService,
      cors: config.cors,
      isProd: config.isProd,
    });

    this.server = http.createServer(app);
    this.server.keepAliveTimeout = 30 * 1000;
    this.server.headersTimeout = 35 * 1000;
    this.server.listen(config.port, () => {
      console.log("[app] server running on port " + config.port);
    });
    this.status = "running";
  }

  async stop_server() {
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    await this.state.stop();
    this.status = undefined;
    this.server = undefined;
  }
}

const appInstance = App.instance;

let isShuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`[app] shutting down (${signal})`);
  await appInstance.stop_server();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

void appInstance.init();

export { App, appInstance };
