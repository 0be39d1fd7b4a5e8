import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import { CampusFlowError } from "@campus-flow/routing";
import type { ErrorKind } from "@campus-flow/types";
import type { ErrorResponse } from "../models/responses.js";

/** HTTP status per core error kind */
export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  "malformed-graph": 500,
  "unknown-node": 404,
  "forecast-not-ready": 409,
  "prediction-failed": 502,
  "invalid-time-context": 400,
  "invalid-query": 400,
};

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction,
): void {
  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    res.status(422).json({
      message: "Validation failed",
      kind: "validation",
      details: err.fields,
    });
    return;
  }

  if (err instanceof CampusFlowError) {
    const status = STATUS_BY_KIND[err.kind];
    if (status >= 500) {
      console.error(`[error] ${err.kind}: ${err.message}`);
    } else {
      console.warn(`[error] ${err.kind}: ${err.message}`);
    }
    const body: ErrorResponse = { message: err.message, kind: err.kind };
    if (err.details.length > 0) body.details = err.details;
    res.status(status).json(body);
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    res.status(500).json({ message: err.message });
    return;
  }

  next(err);
}
