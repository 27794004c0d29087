export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export type { SerializeOptions } from "./core/base-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
