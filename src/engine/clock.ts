/** Source of the current time in integer unix seconds. */
export interface TimeSource {
  now(): number;
}

export const systemClock: TimeSource = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Settable clock for tests and replay. */
export class ManualClock implements TimeSource {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
