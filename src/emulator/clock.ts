import { performance } from 'node:perf_hooks';

// Monotonic millisecond source for the cycle driver.
export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => performance.now() };

// Hand-advanced clock for deterministic runs.
export class ManualClock implements Clock {
  constructor(private t = 0) {}
  now(): number { return this.t; }
  advance(ms: number): void { this.t += ms; }
}
