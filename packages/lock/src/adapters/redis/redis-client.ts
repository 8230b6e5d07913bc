/**
 * The two commands the lock needs from a connection. node-redis clients and
 * the client package's `StoreConnection` both satisfy it.
 */
export type LockStoreClient = {
  set(key: string, value: string, opts: { NX: true; PX: number }): Promise<string | null>

  eval(script: string, opts: { keys: string[]; arguments: string[] }): Promise<unknown>
}
