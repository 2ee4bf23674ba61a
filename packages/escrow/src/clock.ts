/**
 * @escrowpoint/escrow — Clocks.
 */

import type { Clock } from "./types.js";

/**
 * Wall-clock time. Block numbers come from the supplied source, or
 * count whole seconds since the clock was created.
 */
export class SystemClock implements Clock {
  private readonly _startedAt = Math.floor(Date.now() / 1000);

  constructor(private readonly _blockSource?: () => number) {}

  now(): number {
    return Math.floor(Date.now() / 1000);
  }

  blockNumber(): number {
    return this._blockSource?.() ?? this.now() - this._startedAt;
  }
}

/**
 * Clock that only moves when told to. One block per advance() call.
 */
export class ManualClock implements Clock {
  private _now: number;
  private _block: number;

  constructor(start: number, block = 1) {
    this._now = start;
    this._block = block;
  }

  now(): number {
    return this._now;
  }

  blockNumber(): number {
    return this._block;
  }

  /** Move forward by `seconds`, mining one block. */
  advance(seconds: number): void {
    this._now += seconds;
    this._block += 1;
  }

  /** Jump to an absolute time, mining one block. */
  setTime(timestamp: number): void {
    this._now = timestamp;
    this._block += 1;
  }
}
