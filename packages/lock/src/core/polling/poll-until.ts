import type { Milliseconds } from "../../ports/time"
import type { Clock } from "../time/clock"
import { assertPositiveTimeMs, assertValidTimeMs } from "../validation/validation"
import type { Sleep } from "./sleep"

export type PollUntilSuccess<T> = { ok: true; value: T }
export type PollUntilFailure = { ok: false; reason: "timeout" }
export type PollUntilResult<T> = PollUntilSuccess<T> | PollUntilFailure

export type PollOptions = {
  pollMs: Milliseconds
  timeoutMs: Milliseconds
}

export type PollDeps = {
  clock: Clock
  sleep: Sleep
}

/**
 * Calls `fn` until it returns a non-null value or the deadline passes. `fn`
 * runs at least once, even with a zero timeout.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | null>,
  deps: PollDeps,
  opts: PollOptions,
): Promise<PollUntilResult<T>> {
  assertValidTimeMs(opts.timeoutMs, "timeoutMs")
  assertPositiveTimeMs(opts.pollMs, "pollMs")

  const deadline = deps.clock.nowMs() + opts.timeoutMs

  while (true) {
    const result = await fn()

    if (result !== null) return { ok: true, value: result }
    if (deps.clock.nowMs() >= deadline) return { ok: false, reason: "timeout" }

    await deps.sleep(opts.pollMs)
  }
}

export type PollUntilFn = typeof pollUntil
