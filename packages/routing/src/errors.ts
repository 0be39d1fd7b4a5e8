/**
 * Error taxonomy for the routing core.
 *
 * Every error carries a `kind` so callers can branch without instanceof
 * chains, and the HTTP layer can map kinds to status codes.
 */

import type { ErrorKind } from "@campus-flow/types";

export class CampusFlowError extends Error {
  readonly kind: ErrorKind;
  readonly details: string[];

  constructor(kind: ErrorKind, message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CampusFlowError";
    this.kind = kind;
    this.details = details;
  }
}

/** Structural violation in ingested graph data. Fatal at startup. */
export class MalformedGraphError extends CampusFlowError {
  constructor(issues: string[]) {
    super(
      "malformed-graph",
      `Malformed graph: ${issues.length} issue(s), first: ${issues[0] ?? "unknown"}`,
      issues,
    );
    this.name = "MalformedGraphError";
  }
}

export class UnknownNodeError extends CampusFlowError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super("unknown-node", `Unknown node: ${nodeId}`);
    this.name = "UnknownNodeError";
    this.nodeId = nodeId;
  }
}

/** Penalized routing was requested before any forecast was computed. */
export class ForecastNotReadyError extends CampusFlowError {
  constructor() {
    super(
      "forecast-not-ready",
      "No forecast loaded; request a forecast (or pass a time context) before penalized routing",
    );
    this.name = "ForecastNotReadyError";
  }
}

export class PredictionError extends CampusFlowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("prediction-failed", message, [], options);
    this.name = "PredictionError";
  }
}

export class InvalidTimeContextError extends CampusFlowError {
  constructor(issues: string[]) {
    super("invalid-time-context", `Invalid time context: ${issues.join("; ")}`, issues);
    this.name = "InvalidTimeContextError";
  }
}

export class InvalidQueryError extends CampusFlowError {
  constructor(message: string) {
    super("invalid-query", message);
    this.name = "InvalidQueryError";
  }
}
