/**
 * Event clock — randomized, bounded timing for simulated activity
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface IntervalBounds {
  minMs: number;
  maxMs: number;
}

export type RandomSource = () => number;

export class EventClock {
  constructor(private random: RandomSource = Math.random) {}

  /** Uniform delay in [minMs, maxMs], whole milliseconds */
  nextDelay(bounds: IntervalBounds): number {
    const span = Math.max(0, bounds.maxMs - bounds.minMs);
    return Math.round(bounds.minMs + this.random() * span);
  }

  chance(probability: number): boolean {
    return this.random() < probability;
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    const index = Math.min(items.length - 1, Math.floor(this.random() * items.length));
    return items[index];
  }

  /**
   * Sleep for `ms`, waking early when the signal aborts.
   * Resolves `false` when aborted, `true` after a full sleep.
   */
  async sleep(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    try {
      await delay(ms, undefined, { signal });
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }
}

/** Deterministic generator (mulberry32) for reproducible runs */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6D2B79F5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
