import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import SearchController from "./controllers/SearchController";
import { Logging } from "./libs/Logging";
import type { SearchService } from "./services/searchService";
import type { ServiceState } from "./services/serviceState";
import { errorMessage } from "./utils/errors";
import { INTERNAL_SERVER_ERROR, NOT_FOUND } from "./utils/responseCodes";

type ServerOptions = {
  state: ServiceState;
  searchService: SearchService;
  cors: { origin: string; methods: string[] };
  isProd: boolean;
  logRequests?: boolean;
};

export function createServer(options: ServerOptions) {
  const app = express();

  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(compression());
  app.use(cors(options.cors));
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  if (options.logRequests ?? true) {
    app.use(Logging(options.isProd));
  }

  app.use(new SearchController(options.state, options.searchService).routes());

  app.use((_req: Request, res: Response) => {
    res.status(NOT_FOUND).type("text/plain").send("Not found");
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[http] unhandled error", errorMessage(err));
    res.status(INTERNAL_SERVER_ERROR).type("text/plain").send("Internal server error");
  });

  return app;
}
