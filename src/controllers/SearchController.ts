import { Request, Response, Router } from "express";
import { query } from "express-validator";
import { checkReqDataError } from "../middleware/validation";
import type { SearchService } from "../services/searchService";
import type { ServiceState } from "../services/serviceState";
import type { SearchResponse } from "../types";
import {
  IndexStoreFatalError,
  IndexStoreTransientError,
  InputValidationError,
  classifyError,
  errorMessage,
} from "../utils/errors";
import {
  BAD_REQUEST,
  INDEX_STORE_UNAVAILABLE,
  INTERNAL_SERVER_ERROR,
  OK,
  SERVICE_UNAVAILABLE,
} from "../utils/responseCodes";

function coordinate(name: "lat" | "lon", limit: number) {
  return query(name)
    .exists({ values: "falsy" })
    .withMessage(`Missing query parameter: ${name}`)
    .bail()
    .isFloat({ min: -limit, max: limit })
    .withMessage(`Query parameter ${name} must be a number between -${limit} and ${limit}`);
}

function degraded(): SearchResponse {
  return { error: INDEX_STORE_UNAVAILABLE, evas: [], trains: [] };
}

class SearchController {
  rt = Router();
  #state: ServiceState;
  #searchService: SearchService;

  constructor(state: ServiceState, searchService: SearchService) {
    this.#state = state;
    this.#searchService = searchService;
  }

  routes() {
    this.rt.route("/search").get(this.search);
    this.rt.route("/stats").get(this.stats);
    this.rt.route("/health").get(this.health);
    return this.rt;
  }

  search = [
    coordinate("lat", 90),
    coordinate("lon", 180),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const lat = Number.parseFloat(String(req.query.lat));
      const lon = Number.parseFloat(String(req.query.lon));

      try {
        const result = await this.#searchService.search({ lat, lon });
        return res.status(OK).json(result);
      } catch (error) {
        if (error instanceof InputValidationError) {
          return res.status(BAD_REQUEST).type("text/plain").send(error.message);
        }

        if (error instanceof IndexStoreTransientError) {
          return res.status(SERVICE_UNAVAILABLE).json(degraded());
        }

        if (error instanceof IndexStoreFatalError) {
          this.#state.failAfterClose(res, error);
          res.status(SERVICE_UNAVAILABLE).json(degraded());
          return;
        }

        console.error("[search] request failed", {
          lat,
          lon,
          kind: classifyError(error),
          error: errorMessage(error),
        });
        return res
          .status(INTERNAL_SERVER_ERROR)
          .json({ error: "INTERNAL_ERROR", evas: [], trains: [] });
      }
    },
  ];

  stats = (_req: Request, res: Response) => {
    return res.status(OK).json(this.#state.stats());
  };

  health = async (_req: Request, res: Response) => {
    try {
      const indexVersion = await this.#state.currentIndexVersion();
      return res.status(OK).json({ status: "ok", indexVersion });
    } catch (error) {
      if (error instanceof IndexStoreFatalError) {
        this.#state.failAfterClose(res, error);
        res.status(SERVICE_UNAVAILABLE).json({ status: "error", indexVersion: null });
        return;
      }
      return res
        .status(SERVICE_UNAVAILABLE)
        .json({ status: "degraded", indexVersion: null, error: errorMessage(error) });
    }
  };
}

export default SearchController;
