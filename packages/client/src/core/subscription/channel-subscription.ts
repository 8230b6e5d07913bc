import type { PubSubMessage } from "../../ports/pubsub-message"
import type { StoreConnection } from "../../ports/store-connection"

type Failure = { error: unknown }

/**
 * Turns a node-redis channel listener into a pull-based message stream.
 * Messages that arrive while the consumer is busy are buffered in arrival
 * order; the buffer is unbounded.
 *
 * `next()` resolves to `null` once `signal` aborts or the connection ends,
 * and rejects with the connection's error if it emits one.
 */
export class ChannelSubscription {
  private readonly queue: PubSubMessage[] = []
  private wake: (() => void) | null = null
  private failure: Failure | null = null
  private ended = false
  private subscribed = false

  public constructor(
    private readonly connection: StoreConnection,
    readonly channel: string,
    private readonly signal?: AbortSignal,
  ) {}

  async open(): Promise<void> {
    this.connection.on("error", this.onError)
    this.connection.on("end", this.onEnd)
    this.signal?.addEventListener("abort", this.notify, { once: true })

    await this.connection.subscribe(this.channel, (payload, channel) => {
      this.push({ kind: "message", channel, payload })
    })

    this.subscribed = true
    this.push({ kind: "subscribe", channel: this.channel })
  }

  async next(): Promise<PubSubMessage | null> {
    while (true) {
      if (this.signal?.aborted) return null

      const message = this.queue.shift()
      if (message) return message

      if (this.failure) throw this.failure.error
      if (this.ended) return null

      await new Promise<void>((resolve) => {
        this.wake = resolve
      })
    }
  }

  /** Unsubscribes if still subscribed and detaches every listener. */
  async close(): Promise<void> {
    this.ended = true
    this.connection.off("error", this.onError)
    this.connection.off("end", this.onEnd)
    this.signal?.removeEventListener("abort", this.notify)
    this.notify()

    if (this.subscribed && this.connection.isOpen) {
      this.subscribed = false
      await this.connection.unsubscribe(this.channel)
    }
  }

  private push(message: PubSubMessage): void {
    this.queue.push(message)
    this.notify()
  }

  private readonly notify = (): void => {
    const wake = this.wake
    this.wake = null
    wake?.()
  }

  private readonly onError = (error: Error): void => {
    this.failure ??= { error }
    this.notify()
  }

  private readonly onEnd = (): void => {
    this.ended = true
    this.notify()
  }
}
