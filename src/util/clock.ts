/** Seconds since the Unix epoch. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(ts: number): void {
    this.current = ts;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
