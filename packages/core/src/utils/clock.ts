/**
 * Strictly monotonic store clock.
 *
 * Every call to now() returns an ISO 8601 timestamp greater than the one
 * before it, even when the wall clock stalls or moves backwards.
 */

import type { Timestamp } from '../types/record.js';

export interface Clock {
  /** Next timestamp, strictly after every previously issued one */
  now(): Timestamp;
  /** Ensures later timestamps sort after the given one (used when restoring) */
  advanceTo(timestamp: Timestamp): void;
}

export type TimeSource = () => number;

export class MonotonicClock implements Clock {
  private last = 0;

  constructor(private readonly source: TimeSource = Date.now) {}

  now(): Timestamp {
    const wall = this.source();
    this.last = wall > this.last ? wall : this.last + 1;
    return new Date(this.last).toISOString();
  }

  advanceTo(timestamp: Timestamp): void {
    const ms = new Date(timestamp).getTime();
    if (!Number.isNaN(ms) && ms > this.last) {
      this.last = ms;
    }
  }
}

export function createClock(source?: TimeSource): Clock {
  return new MonotonicClock(source);
}
