import type { Emulator } from './core';
import { systemClock, type Clock } from './clock';

export type CpuErrorMode = 'throw' | 'record';

export const TIMER_HZ = 60;
export const DEFAULT_IPS = 700;

export interface SchedulerOptions {
  instructionsPerSecond?: number;
  onCpuError?: CpuErrorMode;
  clock?: Clock;
  maxCatchUpMs?: number; // elapsed time beyond this is dropped, not replayed
}

export interface FrameResult {
  steps: number;
  timerTicks: number;
}

// Sub-millisecond time unit: 1 ms = 60 units, so one timer period is exactly 1000 units.
const UNITS_PER_MS = TIMER_HZ;
const UNITS_PER_TIMER_TICK = 1000;

// Drives the machine from wall-clock time. Instructions run at a configurable rate
// while timers decay at a fixed 60 Hz; both debts carry fractional remainders.
export class Scheduler {
  readonly instructionsPerSecond: number;
  private readonly onCpuError: CpuErrorMode;
  private readonly clock: Clock;
  private readonly maxCatchUpMs: number;
  public lastCpuError: unknown | undefined;

  private instrDebt = 0; // in units * ips
  private timerDebt = 0; // in units
  private lastNow: number | null = null;
  private totalSteps = 0;
  private totalTicks = 0;

  constructor(private readonly emu: Emulator, opts: SchedulerOptions = {}) {
    const ips = opts.instructionsPerSecond ?? DEFAULT_IPS;
    if (!Number.isFinite(ips) || ips <= 0) throw new RangeError(`instructionsPerSecond must be positive, got ${ips}`);
    this.instructionsPerSecond = ips;
    this.onCpuError = opts.onCpuError ?? 'throw';
    this.clock = opts.clock ?? systemClock;
    this.maxCatchUpMs = Math.max(0, opts.maxCatchUpMs ?? 250);
  }

  // Advance by wall-clock time since the previous call. The first call only primes the clock.
  runFrame(): FrameResult {
    const now = this.clock.now();
    const prev = this.lastNow;
    this.lastNow = now;
    if (prev === null) return { steps: 0, timerTicks: 0 };
    return this.advance(now - prev);
  }

  // Forget the previous clock reading, e.g. after the host paused; the next runFrame() only primes.
  resyncClock(): void {
    this.lastNow = null;
  }

  // Exactly one sixtieth of a second.
  stepFrame(): FrameResult {
    return this.advanceUnits(UNITS_PER_TIMER_TICK);
  }

  advance(elapsedMs: number): FrameResult {
    if (!(elapsedMs > 0)) return { steps: 0, timerTicks: 0 };
    return this.advanceUnits(Math.min(elapsedMs, this.maxCatchUpMs) * UNITS_PER_MS);
  }

  stats(): { steps: number; timerTicks: number } {
    return { steps: this.totalSteps, timerTicks: this.totalTicks };
  }

  private advanceUnits(units: number): FrameResult {
    let steps = 0;
    let timerTicks = 0;
    if (this.emu.halted) return { steps, timerTicks };

    this.instrDebt += units * this.instructionsPerSecond;
    const due = Math.floor(this.instrDebt / (UNITS_PER_MS * 1000));
    this.instrDebt -= due * UNITS_PER_MS * 1000;
    for (let i = 0; i < due; i++) {
      try {
        this.emu.step();
        steps++;
      } catch (e) {
        this.lastCpuError = e;
        this.instrDebt = 0;
        this.totalSteps += steps;
        if (this.onCpuError === 'throw') throw e;
        return { steps, timerTicks };
      }
    }

    this.timerDebt += units;
    while (this.timerDebt >= UNITS_PER_TIMER_TICK) {
      this.timerDebt -= UNITS_PER_TIMER_TICK;
      this.emu.tickTimers();
      timerTicks++;
    }

    this.totalSteps += steps;
    this.totalTicks += timerTicks;
    return { steps, timerTicks };
  }
}
