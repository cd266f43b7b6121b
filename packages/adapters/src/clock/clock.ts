import type { ClockPort } from '@feedgate/domain';

/**
 * Manually driven clock. Time stands still until `advance()` moves it, so
 * tests and replays see the same `now()` for every read within a step.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(epochMs: number) {
    this.currentMs = epochMs;
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

export const systemClock: ClockPort = { now: () => new Date() };
