import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock for tests. Time only moves on `advance()` / `set()`.
 */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    if (ms < 0) {
      throw new RangeError(`FakeClock cannot move backwards (got ${ms}ms)`)
    }

    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }
}
