import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function isAppError(err: Error): err is AppError {
  const candidate = err as Partial<AppError>

  return (
    typeof candidate.code === "string" &&
    typeof candidate.context === "object" &&
    candidate.context !== null &&
    typeof candidate.isOperational === "boolean" &&
    candidate.timestamp instanceof Date
  )
}

function errnoCode(err: Error): string | undefined {
  const code = (err as NodeJS.ErrnoException).code

  return typeof code === "string" ? code : undefined
}

/**
 * Serialize any thrown value, walking the `cause` chain.
 *
 * Plain errors get code "unknown"; a Node system error keeps its errno code
 * (e.g. ENOENT) in `context.errno`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const cause = err.cause
    const base = isAppError(err)
      ? {
          code: err.code,
          context: { ...err.context },
          isOperational: err.isOperational,
          timestamp: err.timestamp.toISOString(),
        }
      : {
          code: "unknown",
          context: errnoCode(err) ? { errno: errnoCode(err) } : {},
          isOperational: false,
          timestamp: new Date().toISOString(),
        }

    return {
      name: err.name,
      message: err.message,
      ...base,
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
