import type { RequestHandler } from "express";
import morgan from "morgan";

export function Logging(isProd: boolean): RequestHandler {
  return isProd ? morgan("combined") : morgan("dev");
}
