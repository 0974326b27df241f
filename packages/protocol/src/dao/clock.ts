export interface Clock {
  /** Milliseconds since the epoch, never decreasing. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Clock driven by hand, for hosts that replay time and for tests. */
export class ManualClock implements Clock {
  constructor(private current = 0) {
    assertTimestamp(current);
  }

  now(): number {
    return this.current;
  }

  set(ts: number): void {
    assertTimestamp(ts);
    if (ts < this.current) {
      throw new Error(`clock cannot move backwards (${ts} < ${this.current})`);
    }
    this.current = ts;
  }

  advance(ms: number): void {
    this.set(this.current + ms);
  }
}

function assertTimestamp(ts: number): void {
  if (!Number.isSafeInteger(ts) || ts < 0) {
    throw new Error('timestamp must be a non-negative integer');
  }
}
