export interface Clock {
  now(): Date;
}

export const ANALYSIS_CLOCK = 'ANALYSIS_CLOCK';

/**
 * Wall clock that never repeats or goes back: each reading is at least one
 * millisecond after the previous one.
 */
export class MonotonicClock implements Clock {
  private last = 0;

  now(): Date {
    this.last = Math.max(Date.now(), this.last + 1);
    return new Date(this.last);
  }
}

/** Process-wide instance shared by every analyzer */
export const monotonicClock = new MonotonicClock();
