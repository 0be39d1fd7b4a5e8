import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { NextFunction, Request, Response } from "express";
import { ValidateError } from "@tsoa/runtime";
import {
  ForecastNotReadyError,
  InvalidTimeContextError,
  MalformedGraphError,
  PredictionError,
  UnknownNodeError,
} from "@campus-flow/routing";
import { errorHandler } from "./error-handler.js";

class FakeResponse {
  statusCode = 0;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}

function handle(err: unknown): { res: FakeResponse; next: NextFunction } {
  const res = new FakeResponse();
  const next = vi.fn();
  errorHandler(err, {} as Request, res as unknown as Response, next);
  return { res, next };
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("errorHandler", () => {
  it("maps validation failures to 422", () => {
    const { res } = handle(new ValidateError({ hour: { message: "invalid number", value: "x" } }, "bad"));
    expect(res.statusCode).toBe(422);
    expect(res.body).toEqual({
      message: "Validation failed",
      kind: "validation",
      details: { hour: { message: "invalid number", value: "x" } },
    });
  });

  it("maps unknown nodes to 404", () => {
    const { res } = handle(new UnknownNodeError("Z"));
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ message: "Unknown node: Z", kind: "unknown-node" });
  });

  it("maps a missing forecast to 409", () => {
    const { res } = handle(new ForecastNotReadyError());
    expect(res.statusCode).toBe(409);
    expect(res.body).toMatchObject({ kind: "forecast-not-ready" });
  });

  it("maps invalid time contexts to 400 with details", () => {
    const { res } = handle(new InvalidTimeContextError(["hour must be an integer in [0, 23], got 24"]));
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      message: "Invalid time context: hour must be an integer in [0, 23], got 24",
      kind: "invalid-time-context",
      details: ["hour must be an integer in [0, 23], got 24"],
    });
  });

  it("maps predictor failures to 502 and graph faults to 500", () => {
    expect(handle(new PredictionError("Model service unavailable: timeout")).res.statusCode).toBe(502);
    expect(handle(new MalformedGraphError(["duplicate node id \"A\""])).res.statusCode).toBe(500);
    expect(console.error).toHaveBeenCalledTimes(2);
  });

  it("maps any other error to 500", () => {
    const { res } = handle(new Error("boom"));
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ message: "boom" });
  });

  it("passes non-errors on", () => {
    const { res, next } = handle("boom");
    expect(next).toHaveBeenCalledWith("boom");
    expect(res.statusCode).toBe(0);
  });
});
