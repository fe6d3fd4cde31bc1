export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { type SerializeOptions, serializeError } from "./core/serialize-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
