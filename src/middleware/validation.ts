import type { NextFunction, Request, Response } from "express";
import { validationResult } from "express-validator";
import { BAD_REQUEST } from "../utils/responseCodes";

export const checkReqDataError = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const errors = validationResult(req);
  if (errors.isEmpty()) {
    next();
    return;
  }

  const messages = errors.array().map((error) => String(error.msg));
  res.status(BAD_REQUEST).type("text/plain").send(messages.join("\n"));
};
