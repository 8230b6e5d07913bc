import { BaseError, type BaseErrorOptions } from "@keyspace/errors"

type ErrorOptions<C extends Lowercase<string>> = Omit<BaseErrorOptions<C>, "code">

/** The store could not be reached, or the pool could not hand out a connection. */
export class ConnectionError extends BaseError<"connection_error"> {
  constructor(message: string, options: ErrorOptions<"connection_error"> = {}) {
    super(message, { isRetryable: true, ...options, code: "connection_error" })
  }
}

/** A store call made by a client operation failed. The original error is the `cause`. */
export class OperationError extends BaseError<"operation_error"> {
  constructor(message: string, options: ErrorOptions<"operation_error"> = {}) {
    super(message, { ...options, code: "operation_error" })
  }
}

export class NotInitializedError extends BaseError<"not_initialized"> {
  constructor(namespace: string) {
    super(`Client for namespace "${namespace}" is not initialized; call init() first`, {
      code: "not_initialized",
      context: { namespace },
      isOperational: false,
    })
  }
}

export class ClientClosedError extends BaseError<"client_closed"> {
  constructor(namespace: string) {
    super(`Client for namespace "${namespace}" is closed`, {
      code: "client_closed",
      context: { namespace },
      isOperational: false,
    })
  }
}
