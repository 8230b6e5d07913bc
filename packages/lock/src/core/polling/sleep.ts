import { setTimeout } from "node:timers/promises"
import type { Milliseconds } from "../../ports/time"

export type Sleep = (ms: Milliseconds) => Promise<void>

export async function sleep(ms: Milliseconds): Promise<void> {
  await setTimeout(ms)
}
