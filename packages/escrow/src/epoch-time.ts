/**
 * Week alignment.
 *
 * Lock ends and slope-change keys are always multiples of WEEK
 * (Unix weeks start on Thursday 00:00 UTC).
 */

import { WEEK } from "./types.js";

/** Start of the week containing `ts`. */
export function roundDownToWeek(ts: number): number {
  return Math.floor(ts / WEEK) * WEEK;
}

/** Smallest week boundary at or after `ts`. */
export function roundUpToWeek(ts: number): number {
  return Math.ceil(ts / WEEK) * WEEK;
}

/** First week boundary strictly after `ts`. */
export function nextWeekBoundary(ts: number): number {
  return roundDownToWeek(ts) + WEEK;
}

export function isWeekAligned(ts: number): boolean {
  return ts % WEEK === 0;
}

/**
 * Unlock time for a lock of `duration` seconds taken at `now`:
 * the week boundary at or before `now + duration`.
 */
export function lockEndFor(now: number, duration: number): number {
  return roundDownToWeek(now + duration);
}
