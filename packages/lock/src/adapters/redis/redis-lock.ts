import { randomUUID } from "node:crypto"
import { type PollUntilFn, pollUntil } from "../../core/polling/poll-until"
import { type Sleep, sleep } from "../../core/polling/sleep"
import { type Clock, SystemClock } from "../../core/time/clock"
import { assertPositiveTimeMs, assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig, TryAcquireOptions } from "../../ports/options"
import type { LockStoreClient } from "./redis-client"
import { RedisLease } from "./redis-lock-lease"

/**
 * Prepended verbatim to every lock key. Leave empty when the key already
 * carries its full identity, as with `"<namespace>:lock"`, so that other
 * processes using the same naming contend on the same store key.
 */
export type KeyspacePrefix = string

export type RedisLockDeps = {
  client: LockStoreClient
  clock: Clock
  sleep: Sleep
  generateToken: () => string
  pollUntil: PollUntilFn
}

export type RedisLockConfig = LockConfig & {
  keyspacePrefix?: KeyspacePrefix
}

/**
 * Single-instance Redis lock: `SET key token NX PX ttl` to acquire, a
 * compare-and-delete script to release.
 */
export class RedisLock implements Lock {
  private readonly deps: RedisLockDeps
  private readonly prefix: string

  public constructor(
    deps: Pick<RedisLockDeps, "client"> & Partial<RedisLockDeps>,
    private readonly config: RedisLockConfig,
  ) {
    assertValidTimeMs(config.defaultTimeoutMs, "LockConfig.defaultTimeoutMs")
    assertPositiveTimeMs(config.pollMs, "LockConfig.pollMs")

    this.deps = {
      clock: new SystemClock(),
      sleep,
      generateToken: randomUUID,
      pollUntil,
      ...deps,
    }
    this.prefix = config.keyspacePrefix ?? ""
  }

  async acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null> {
    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs

    assertValidTimeMs(timeoutMs, "AcquireOptions.timeoutMs")

    if (timeoutMs === 0) return await this.tryAcquire(key, { ttl: opts.ttl })

    const acquired = await this.deps.pollUntil(
      () => this.tryAcquire(key, { ttl: opts.ttl }),
      { clock: this.deps.clock, sleep: this.deps.sleep },
      { pollMs: this.config.pollMs, timeoutMs },
    )

    return acquired.ok ? acquired.value : null
  }

  async tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null> {
    assertPositiveTimeMs(opts.ttl.milliseconds, `ttl for lock ${key}`)

    const redisKey = this.formatKey(key)
    const token = this.deps.generateToken()

    const res = await this.deps.client.set(redisKey, token, {
      NX: true,
      PX: opts.ttl.milliseconds,
    })

    if (res !== "OK") return null

    return new RedisLease(key, { redisKey, token, client: this.deps.client })
  }

  private formatKey(key: LockKey): string {
    return `${this.prefix}${key}`
  }
}
