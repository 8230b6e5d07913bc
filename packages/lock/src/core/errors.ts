import { BaseError } from "@keyspace/errors"

export class LockTimeoutError extends BaseError<"lock_timeout"> {
  constructor(key: string, timeoutMs: number | undefined) {
    super(`Timed out acquiring lock ${key}`, {
      code: "lock_timeout",
      context: { key, ...(timeoutMs !== undefined && { timeoutMs }) },
      isRetryable: true,
    })
  }
}
