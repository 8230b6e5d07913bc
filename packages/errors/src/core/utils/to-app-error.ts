import type { ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Normalize a caught value into a `BaseError`.
 *
 * A `BaseError` is returned as is. Anything else is wrapped with
 * `fallbackCode` and `isOperational: false`, keeping the original as `cause`
 * when it is an `Error`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): BaseError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
