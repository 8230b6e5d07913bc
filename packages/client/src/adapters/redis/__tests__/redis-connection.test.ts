import { EventEmitter } from "node:events"
import { captureLogger } from "../../../tests/utils/capture-logger"
import { createRedisConnection, MAX_RECONNECT_DELAY_MS } from "../redis-connection"

type ClientOptions = {
  socket: {
    host: string
    port: number
    reconnectStrategy: (retries: number, cause: Error) => number | Error
  }
  database: number
}

const redis = vi.hoisted(() => {
  const created: { options: ClientOptions; client: EventEmitter }[] = []

  return { created }
})

vi.mock("redis", async () => {
  const { EventEmitter: Emitter } = await import("node:events")

  return {
    createClient: (options: ClientOptions) => {
      const client = new Emitter()
      redis.created.push({ options, client })
      return client
    },
  }
})

describe("createRedisConnection", () => {
  beforeEach(() => {
    redis.created.length = 0
  })

  it("passes host, port and database to node-redis", () => {
    createRedisConnection({ host: "cache.internal", port: 6380, db: 2 }, captureLogger().logger)

    expect(redis.created[0]?.options).toEqual({
      socket: { host: "cache.internal", port: 6380, reconnectStrategy: expect.any(Function) },
      database: 2,
    })
  })

  it("passes credentials only when set", () => {
    createRedisConnection(
      { host: "localhost", port: 6379, db: 0, username: "app", password: "test-secret" },
      captureLogger().logger,
    )

    expect(redis.created[0]?.options).toMatchObject({ username: "app", password: "test-secret" })
  })

  it("logs connection errors instead of crashing", () => {
    const { logger, entries } = captureLogger()
    createRedisConnection({ host: "localhost", port: 6379, db: 0 }, logger)

    const client = redis.created[0]?.client ?? new EventEmitter()
    client.emit("error", new Error("connect ECONNREFUSED 127.0.0.1:6379"))

    expect(entries("error")[0]).toMatchObject({
      msg: "Store connection error",
      host: "localhost",
      port: 6379,
      err: { message: "connect ECONNREFUSED 127.0.0.1:6379" },
    })
  })

  it("fails the first connect on the first socket error instead of retrying", () => {
    createRedisConnection({ host: "localhost", port: 6379, db: 0 }, captureLogger().logger)

    const options = redis.created[0]?.options
    const refused = new Error("connect ECONNREFUSED 127.0.0.1:6379")

    expect(options?.socket.reconnectStrategy(0, refused)).toBe(refused)
    expect(options?.socket.reconnectStrategy(5, refused)).toBe(refused)
  })

  it("retries with a capped delay once the connection has been ready", () => {
    createRedisConnection({ host: "localhost", port: 6379, db: 0 }, captureLogger().logger)

    const created = redis.created[0]
    created?.client.emit("ready")
    const reset = new Error("read ECONNRESET")

    expect(created?.options.socket.reconnectStrategy(0, reset)).toBe(100)
    expect(created?.options.socket.reconnectStrategy(4, reset)).toBe(500)
    expect(created?.options.socket.reconnectStrategy(100, reset)).toBe(MAX_RECONNECT_DELAY_MS)
  })
})
