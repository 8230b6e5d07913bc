import type { Milliseconds } from "../../ports/time"

export type Clock = {
  now(): Date
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}
