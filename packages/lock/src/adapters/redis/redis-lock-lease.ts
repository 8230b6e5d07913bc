import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockStoreClient } from "./redis-client"

/** Deletes KEYS[1] only while it still holds this lease's token (ARGV[1]). */
export const RELEASE_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`

type RedisLeaseDeps = {
  redisKey: string
  token: string
  client: LockStoreClient
}

export class RedisLease implements LockLease {
  private released = false

  public constructor(
    public readonly key: LockKey,
    private readonly deps: RedisLeaseDeps,
  ) {}

  async release(): Promise<void> {
    if (this.released) return

    this.released = true

    await this.deps.client.eval(RELEASE_SCRIPT, {
      keys: [this.deps.redisKey],
      arguments: [this.deps.token],
    })
  }
}
