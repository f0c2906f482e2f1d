/**
 * Time source injected into every component that stamps events or measures
 * durations, so tests and simulations can run on a reproducible timeline.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * A clock that advances by `step` on every read. Durations measured with it
 * count clock reads, which depend only on what a run did, never on wall time.
 */
export class TickClock implements Clock {
  private current: number;

  constructor(start = 0, private readonly step = 1) {
    this.current = start;
  }

  now(): number {
    const value = this.current;
    this.current += this.step;
    return value;
  }
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
