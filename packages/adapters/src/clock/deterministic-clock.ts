import { InvalidParameterError, type ClockPort, type RandomSource } from '@evsim/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Every randomized anomaly transform draws from one of these, so a session
 * run twice with the same seed makes the same decisions.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max]. */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a float in [min, max). */
  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }
}

interface Waiter {
  readonly atMs: number;
  readonly seq: number;
  readonly resolve: () => void;
}

/**
 * Simulated clock. Time moves only when the owner calls `advance`; callers
 * parked in `waitUntil` are released, earliest first, once their time is
 * reached.
 */
export class SimulationClock implements ClockPort {
  private currentMs: number;
  private waiters: Waiter[] = [];
  private seq = 0;

  constructor(epochMs = 0) {
    this.currentMs = epochMs;
  }

  nowMs(): number {
    return this.currentMs;
  }

  advance(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new InvalidParameterError(`Clock cannot advance by ${ms} ms`);
    }
    this.currentMs += ms;

    const due = this.waiters
      .filter((w) => w.atMs <= this.currentMs)
      .sort((a, b) => a.atMs - b.atMs || a.seq - b.seq);
    this.waiters = this.waiters.filter((w) => w.atMs > this.currentMs);
    for (const waiter of due) waiter.resolve();
  }

  waitUntil(atMs: number): Promise<void> {
    if (atMs <= this.currentMs) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push({ atMs, seq: this.seq++, resolve });
    });
  }

  releaseWaiters(): void {
    const parked = this.waiters.sort((a, b) => a.atMs - b.atMs || a.seq - b.seq);
    this.waiters = [];
    for (const waiter of parked) waiter.resolve();
  }

  pendingWaiters(): number {
    return this.waiters.length;
  }
}
