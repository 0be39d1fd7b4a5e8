/**
 * Time context validation and keying.
 */

import type { CongestionLevel, TimeContext } from "@campus-flow/types";
import { InvalidTimeContextError } from "../errors.js";

/** 24 hours x 7 days x 2 peak flags */
export const TIME_CONTEXT_KEY_SPACE = 24 * 7 * 2;

/** Ratio thresholds for congestion levels: below LOW is low, below MEDIUM is medium */
export const CONGESTION_THRESHOLDS = { low: 0.5, medium: 0.8 } as const;

/** @throws InvalidTimeContextError when any field is out of range */
export function validateTimeContext(context: TimeContext): TimeContext {
  const issues: string[] = [];
  if (!Number.isInteger(context.hour) || context.hour < 0 || context.hour > 23) {
    issues.push(`hour must be an integer in [0, 23], got ${context.hour}`);
  }
  if (!Number.isInteger(context.dayOfWeek) || context.dayOfWeek < 0 || context.dayOfWeek > 6) {
    issues.push(`dayOfWeek must be an integer in [0, 6], got ${context.dayOfWeek}`);
  }
  if (context.isPeak !== 0 && context.isPeak !== 1) {
    issues.push(`isPeak must be 0 or 1, got ${String(context.isPeak)}`);
  }
  if (issues.length > 0) {
    throw new InvalidTimeContextError(issues);
  }
  return { hour: context.hour, dayOfWeek: context.dayOfWeek, isPeak: context.isPeak };
}

export function timeContextKey(context: TimeContext): string {
  return `${context.hour}:${context.dayOfWeek}:${context.isPeak}`;
}

export function congestionRatio(predFlow: number, capacity: number): number {
  return predFlow / Math.max(capacity, 1);
}

export function congestionLevel(ratio: number): CongestionLevel {
  if (ratio < CONGESTION_THRESHOLDS.low) return "low";
  if (ratio < CONGESTION_THRESHOLDS.medium) return "medium";
  return "high";
}
