/**
 * `SET` modifiers. `EX` is seconds, `PX` milliseconds. `NX` writes only when
 * the key is absent.
 */
export type StoreSetOptions = {
  EX?: number
  PX?: number
  NX?: boolean
}

/** Called with the payload first, as node-redis does. */
export type ChannelListener = (message: string, channel: string) => void

/**
 * The subset of a node-redis client the facade drives. Replies are decoded
 * to strings.
 */
export type StoreConnection = {
  readonly isOpen: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  /** Closes the socket at once, dropping pending commands and any reconnect attempt. */
  destroy(): void

  get(key: string): Promise<string | null>
  set(key: string, value: string, opts?: StoreSetOptions): Promise<string | null>
  keys(pattern: string): Promise<string[]>
  sAdd(key: string, members: string[]): Promise<number>
  publish(channel: string, message: string): Promise<number>

  /** Puts the connection in subscriber mode until every channel is unsubscribed. */
  subscribe(channel: string, listener: ChannelListener): Promise<void>
  unsubscribe(channel?: string): Promise<void>

  eval(script: string, opts: { keys: string[]; arguments: string[] }): Promise<unknown>

  on(event: "error", listener: (err: Error) => void): unknown
  on(event: "end", listener: () => void): unknown
  off(event: "error", listener: (err: Error) => void): unknown
  off(event: "end", listener: () => void): unknown
}

/** Builds an unconnected connection. The pool calls `connect()`. */
export type ConnectionFactory = () => StoreConnection
