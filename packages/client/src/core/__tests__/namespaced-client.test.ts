import { LockTimeoutError, RELEASE_SCRIPT } from "@keyspace/lock"
import type { NamespacedClientOptions } from "../../ports/client-options"
import { captureLogger } from "../../tests/utils/capture-logger"
import { InMemoryStore } from "../../tests/utils/in-memory-store"
import {
  ClientClosedError,
  ConnectionError,
  NotInitializedError,
  OperationError,
} from "../errors"
import { createNamespacedClient, NamespacedClient } from "../namespaced-client"
import { BlockingConnectionPool } from "../pool/blocking-pool"

function setup(maxConnections = 10) {
  const store = new InMemoryStore()
  const { logger, entries } = captureLogger()
  const pool = new BlockingConnectionPool(
    { createConnection: store.connectionFactory, logger },
    { maxConnections, timeoutMs: 1_000 },
  )

  const make = (options: Partial<NamespacedClientOptions> = {}) =>
    new NamespacedClient(
      { pool, logger },
      { namespace: "orders", lock: { pollMs: 5, timeoutMs: 500 }, ...options },
    )

  return { store, pool, entries, make }
}

/** Holds the namespace lock from outside the client, as another process would. */
async function holdLock(store: InMemoryStore, key: string): Promise<void> {
  const other = store.connection()
  await other.connect()
  await other.set(key, "another-process", { NX: true, PX: 60_000 })
}

describe("NamespacedClient", () => {
  describe("lifecycle", () => {
    it("performs no I/O on construction", () => {
      const { store, make } = setup()

      const client = make()

      expect(client.status).toBe("uninitialized")
      expect(client.lockKey).toBe("orders:lock")
      expect(store.calls).toEqual([])
    })

    it.each([
      ["get", (c: NamespacedClient) => c.get("a")],
      ["set", (c: NamespacedClient) => c.set("a", "1")],
      ["keys", (c: NamespacedClient) => c.keys("*")],
      ["sadd", (c: NamespacedClient) => c.sadd("s", "x")],
      ["publish", (c: NamespacedClient) => c.publish("events", "x")],
      ["subscribe", (c: NamespacedClient) => c.subscribe("events", () => {})],
    ])("%s before init() throws NotInitializedError", async (_name, call) => {
      const { make } = setup()

      await expect(call(make())).rejects.toBeInstanceOf(NotInitializedError)
    })

    it("init() holds one pooled connection and logs", async () => {
      const { pool, entries, make } = setup()

      const client = await make().init()

      expect(client.status).toBe("ready")
      expect(pool.stats()).toMatchObject({ total: 1, inUse: 1 })
      expect(entries("info")).toContainEqual(
        expect.objectContaining({
          msg: "Client connected",
          module: "namespaced-client",
          namespace: "orders",
        }),
      )
    })

    it("shares one attempt between concurrent init() calls", async () => {
      const { store, make } = setup()
      const client = make()

      const [a, b] = await Promise.all([client.init(), client.init()])

      expect(a).toBe(client)
      expect(b).toBe(client)
      expect(store.calls.filter((c) => c.command === "connect")).toHaveLength(1)
    })

    it("init() on a ready client is a no-op", async () => {
      const { pool, make } = setup()
      const client = await make().init()

      await client.init()

      expect(pool.stats().total).toBe(1)
    })

    it("init() failure throws ConnectionError and leaves the client uninitialized", async () => {
      const { store, entries, make } = setup()
      const client = make()
      store.setReachable(false)

      await expect(client.init()).rejects.toBeInstanceOf(ConnectionError)

      expect(client.status).toBe("uninitialized")
      await expect(client.get("a")).rejects.toBeInstanceOf(NotInitializedError)
      expect(entries("error")[0]).toMatchObject({ msg: "Client failed to connect" })

      store.setReachable(true)
      await expect(client.init()).resolves.toBe(client)
    })

    it("init() fails with ConnectionError when the store never answers", async () => {
      vi.useFakeTimers()

      try {
        const { store, pool, make } = setup()
        const client = make()
        store.stallConnects(true)

        const failed = client.init().catch((e: unknown) => e)
        await vi.advanceTimersByTimeAsync(1_000)

        await expect(failed).resolves.toBeInstanceOf(ConnectionError)
        expect(client.status).toBe("uninitialized")
        expect(store.openConnections()).toBe(0)
        expect(pool.stats().total).toBe(0)
      } finally {
        vi.useRealTimers()
      }
    })

    it("returns the connection when the lock cannot be built", async () => {
      const { pool } = setup()
      const client = new NamespacedClient(
        {
          pool,
          logger: captureLogger().logger,
          createLock: () => {
            throw new RangeError("pollMs must be positive")
          },
        },
        { namespace: "orders" },
      )

      const err = await client.init().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ConnectionError)
      expect(err).toMatchObject({
        message: 'Client for namespace "orders" failed to connect',
        context: { namespace: "orders" },
      })
      expect(err).toHaveProperty("cause.message", "pollMs must be positive")
      expect(pool.stats()).toMatchObject({ total: 1, idle: 1, inUse: 0 })
    })

    it("close() returns the connection and rejects later operations", async () => {
      const { pool, make } = setup()
      const client = await make().init()

      await client.close()

      expect(client.status).toBe("closed")
      expect(pool.stats()).toMatchObject({ idle: 1, inUse: 0 })
      expect(pool.closed).toBe(false)
      await expect(client.get("a")).rejects.toBeInstanceOf(ClientClosedError)
      await expect(client.set("a", "1")).rejects.toMatchObject({
        code: "client_closed",
        context: { namespace: "orders" },
      })
    })

    it("closing twice does not throw or affect other clients", async () => {
      const { entries, make } = setup()
      const a = await make().init()
      const b = await make().init()
      await b.set("k", "v")

      await a.close()
      await a.close()

      await expect(b.get("k")).resolves.toBe("v")
      expect(entries("info").filter((e) => e.msg === "Client closed")).toHaveLength(1)
    })

    it("close() on a client that never connected is a no-op", async () => {
      const { store, make } = setup()
      const client = make()

      await client.close()

      expect(client.status).toBe("uninitialized")
      expect(store.calls).toEqual([])
    })

    it("can be initialized again after close()", async () => {
      const { make } = setup()
      const client = await make().init()
      await client.set("k", "v")
      await client.close()

      await client.init()

      expect(client.status).toBe("ready")
      await expect(client.get("k")).resolves.toBe("v")
    })

    it("use() closes the client after fn resolves", async () => {
      const { make } = setup()
      const client = make()

      const value = await client.use(async (c) => {
        await c.set("k", "v")
        return c.get("k")
      })

      expect(value).toBe("v")
      expect(client.status).toBe("closed")
    })

    it("use() closes the client when fn throws", async () => {
      const { pool, make } = setup()
      const client = make()
      const err = new Error("boom")

      await expect(client.use(async () => Promise.reject(err))).rejects.toBe(err)

      expect(client.status).toBe("closed")
      expect(pool.stats().inUse).toBe(0)
    })

    it("createNamespacedClient() returns an initialized client", async () => {
      const { pool } = setup()

      const client = await createNamespacedClient(
        { pool, logger: captureLogger().logger },
        { namespace: "invoices" },
      )

      expect(client.status).toBe("ready")
      expect(client.lockKey).toBe("invoices:lock")
    })
  })

  describe("operations", () => {
    it("get of a key that was never set returns null", async () => {
      const { make } = setup()
      const client = await make().init()

      await expect(client.get("missing")).resolves.toBeNull()
    })

    it("set, get, keys and sadd round-trip", async () => {
      const { make } = setup()
      const client = await make().init()

      await client.set("a", "1")

      await expect(client.get("a")).resolves.toBe("1")
      await expect(client.keys("a*")).resolves.toContain("a")
      await expect(client.sadd("s", "x", "y")).resolves.toBe(2)
      await expect(client.sadd("s", "x")).resolves.toBe(0)
    })

    it("keys() matches store glob patterns and excludes the released lock", async () => {
      const { make } = setup()
      const client = await make().init()

      await client.set("user:1", "a")
      await client.set("user:2", "b")
      await client.set("user:10", "c")
      await client.set("session:1", "d")

      const keys = await client.keys("user:?")

      expect([...keys].sort()).toEqual(["user:1", "user:2"])
      await expect(client.keys("orders:*")).resolves.toEqual([])
    })

    it("set() with ttlSeconds writes EX and expires", async () => {
      vi.useFakeTimers({ toFake: ["Date"] })

      try {
        const { store, make } = setup()
        const client = await make().init()

        await client.set("token", "t1", 2)

        expect(store.calls).toContainEqual({ command: "set", args: ["token", "t1", { EX: 2 }] })
        await expect(client.get("token")).resolves.toBe("t1")

        vi.setSystemTime(Date.now() + 2_500)

        await expect(client.get("token")).resolves.toBeNull()
      } finally {
        vi.useRealTimers()
      }
    })

    it("a later set() with a shorter ttl wins before expiry", async () => {
      const { make } = setup()
      const client = await make().init()

      await client.set("token", "old", 60)
      await client.set("token", "new", 5)

      await expect(client.get("token")).resolves.toBe("new")
    })

    it.each([0, -1, 1.5, Number.NaN])(
      "set() rejects ttlSeconds %s before any I/O",
      async (ttlSeconds) => {
        const { store, make } = setup()
        const client = await make().init()
        const before = store.calls.length

        const err = await client.set("a", "1", ttlSeconds).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(OperationError)
        expect(err).toMatchObject({
          message: `ttlSeconds must be a positive integer, got: ${ttlSeconds}`,
          context: { namespace: "orders", operation: "set", key: "a" },
        })
        expect(store.calls.length).toBe(before)
      },
    )

    it("set() runs under the namespace lock and releases it", async () => {
      const { store, make } = setup()
      const client = await make().init()
      const before = store.calls.length

      await client.set("a", "1")

      const calls = store.calls.slice(before)
      expect(calls.map((c) => c.command)).toEqual(["set", "set", "eval"])
      expect(calls[0]?.args[0]).toBe("orders:lock")
      expect(calls[0]?.args[2]).toEqual({ NX: true, PX: 10_000 })
      expect(calls[1]?.args).toEqual(["a", "1", undefined])
      expect(calls[2]?.args[0]).toBe(RELEASE_SCRIPT)
      expect(store.peek("orders:lock")).toBeNull()
    })

    it("sadd() runs under the namespace lock", async () => {
      const { store, make } = setup()
      const client = await make().init()
      const before = store.calls.length

      await client.sadd("s", "x")

      expect(store.calls.slice(before).map((c) => c.command)).toEqual(["set", "sAdd", "eval"])
    })

    it("reads and publish do not touch the lock", async () => {
      const { store, make } = setup()
      const client = await make().init()
      const before = store.calls.length

      await client.get("a")
      await client.keys("*")
      await client.publish("events", "x")

      expect(store.calls.slice(before).map((c) => c.command)).toEqual(["get", "keys", "publish"])
    })

    it("sadd() with no values returns 0 without a round trip", async () => {
      const { store, make } = setup()
      const client = await make().init()
      const before = store.calls.length

      await expect(client.sadd("s")).resolves.toBe(0)
      expect(store.calls.length).toBe(before)
    })

    it("concurrent sadd() from two clients on one namespace keeps every distinct value", async () => {
      const { store, make } = setup()
      const a = await make().init()
      const b = await make().init()

      const [added1, added2] = await Promise.all([
        a.sadd("s", "x", "y"),
        b.sadd("s", "y", "z"),
      ])

      expect(added1 + added2).toBe(3)
      expect(store.peek("s")).toEqual(["x", "y", "z"])
    })

    it("skips the write while the namespace lock stays held elsewhere", async () => {
      const { store, make } = setup()
      const client = await make({ lock: { pollMs: 5, timeoutMs: 40 } }).init()
      await holdLock(store, "orders:lock")

      await client.set("a", "1")

      expect(store.peek("a")).toBeNull()
      expect(store.peek("orders:lock")).toBe("another-process")
    })

    it("a lock on another namespace does not block", async () => {
      const { store, make } = setup()
      const client = await make({ lock: { pollMs: 5, timeoutMs: 40 } }).init()
      await holdLock(store, "invoices:lock")

      await client.set("a", "1")

      expect(store.peek("a")).toBe("1")
    })
  })

  describe("error policy", () => {
    it("swallow: failures are logged and soft results returned", async () => {
      const { store, entries, make } = setup()
      const client = await make().init()

      store.failNext("get")
      store.failNext("keys")
      store.failNext("sAdd")
      store.failNext("publish")

      await expect(client.get("a")).resolves.toBeNull()
      await expect(client.keys("a*")).resolves.toEqual([])
      await expect(client.sadd("s", "x")).resolves.toBe(0)
      await expect(client.publish("events", "x")).resolves.toBeUndefined()

      expect(entries("error").map((e) => [e.msg, e.operation])).toEqual([
        ["get failed", "get"],
        ["keys failed", "keys"],
        ["sadd failed", "sadd"],
        ["publish failed", "publish"],
      ])
      expect(entries("error")[0]).toMatchObject({
        module: "namespaced-client",
        namespace: "orders",
        key: "a",
        err: { message: "get failed" },
      })
      expect(entries("error")[1]).toMatchObject({ pattern: "a*" })
      expect(entries("error")[3]).toMatchObject({ channel: "events" })
    })

    it("swallow: a failed set() is a no-op", async () => {
      const { store, make } = setup()
      const client = await make().init()

      store.failNext("set")

      await expect(client.set("a", "1")).resolves.toBeUndefined()
      expect(store.peek("a")).toBeNull()
      expect(store.peek("orders:lock")).toBeNull()
    })

    it("swallow: the client stays usable after a failure", async () => {
      const { store, make } = setup()
      const client = await make().init()

      store.failNext("sAdd")

      await expect(client.sadd("s", "x")).resolves.toBe(0)
      expect(store.peek("orders:lock")).toBeNull()
      await expect(client.sadd("s", "x")).resolves.toBe(1)
      expect(client.status).toBe("ready")
    })

    it("swallow: a lock timeout is logged and the write skipped", async () => {
      const { store, entries, make } = setup()
      const client = await make({ lock: { pollMs: 5, timeoutMs: 30 } }).init()
      await holdLock(store, "orders:lock")

      await expect(client.sadd("s", "x")).resolves.toBe(0)

      expect(store.peek("s")).toBeNull()
      expect(entries("error")[0]).toMatchObject({
        msg: "sadd failed",
        err: { type: "LockTimeoutError", message: "Timed out acquiring lock orders:lock" },
      })
    })

    it("propagate: rethrows an OperationError caused by the store error", async () => {
      const { store, entries, make } = setup()
      const client = await make({ errorPolicy: "propagate" }).init()
      const cause = new Error("READONLY You can't write against a read only replica.")
      store.failNext("get", cause)

      const err = await client.get("a").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(OperationError)
      expect(err).toMatchObject({
        code: "operation_error",
        message: `get failed in namespace "orders": ${cause.message}`,
        context: { namespace: "orders", operation: "get", key: "a" },
        cause,
      })
      expect(entries("error")).toHaveLength(1)
    })

    it("propagate: wraps a lock timeout so callers match one class", async () => {
      const { store, make } = setup()
      const client = await make({
        errorPolicy: "propagate",
        lock: { pollMs: 5, timeoutMs: 30 },
      }).init()
      await holdLock(store, "orders:lock")

      const err = await client.set("a", "1").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(OperationError)
      expect(err).toMatchObject({ isRetryable: true, context: { operation: "set", key: "a" } })
      expect(err).toHaveProperty("cause", expect.any(LockTimeoutError))
    })

    it.each(["swallow", "propagate"] as const)(
      "%s: NotInitializedError and ClientClosedError are always thrown",
      async (errorPolicy) => {
        const { make } = setup()
        const client = make({ errorPolicy })

        await expect(client.keys("*")).rejects.toBeInstanceOf(NotInitializedError)

        await client.init()
        await client.close()

        await expect(client.keys("*")).rejects.toBeInstanceOf(ClientClosedError)
      },
    )
  })
})
