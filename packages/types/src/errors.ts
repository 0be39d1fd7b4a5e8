/** Discriminant carried by every routing-core error */
export type ErrorKind =
  | "malformed-graph"
  | "unknown-node"
  | "forecast-not-ready"
  | "prediction-failed"
  | "invalid-time-context"
  | "invalid-query";
