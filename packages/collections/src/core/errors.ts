import { BaseError, type ErrorContext } from "@keyline/errors"

export type ConversionErrorOptions = {
  raw?: string
  target?: string
  cause?: unknown
  isOperational?: boolean
}

/**
 * A stored string could not be turned into the requested type, or a value
 * could not be encoded.
 */
export class ConversionError extends BaseError<"conversion_failed"> {
  constructor(message: string, options: ConversionErrorOptions = {}) {
    super(message, {
      code: "conversion_failed",
      context: {
        ...(options.raw !== undefined && { raw: options.raw }),
        ...(options.target !== undefined && { target: options.target }),
      },
      cause: options.cause,
      isOperational: options.isOperational ?? true,
    })
  }
}

/**
 * Any failure reported by the store client or the server, with the original
 * kept as `cause`.
 */
export class RemoteStoreError extends BaseError<"remote_store_failed"> {
  constructor(command: string, key: string, cause: unknown) {
    super(`${command} on "${key}" failed: ${describe(cause)}`, {
      code: "remote_store_failed",
      context: { key, command },
      cause,
    })
  }
}

export class ValidationError extends BaseError<"validation_failed"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "validation_failed", context })
  }
}

export class MemberNotFoundError extends BaseError<"member_not_found"> {
  constructor(key: string, member: string) {
    super(`Member "${member}" not found in "${key}"`, {
      code: "member_not_found",
      context: { key, member },
    })
  }
}

/**
 * Any failure observed after `signal` fired counts as the abort, whatever
 * the client rejected with.
 */
export function isAbortError(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true

  return err instanceof Error && err.name === "AbortError"
}

function describe(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return typeof cause === "string" ? cause : "unknown error"
}
