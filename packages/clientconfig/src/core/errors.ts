import { BaseError, type ErrorContext } from "@etcd-env/errors"
import type { ClientConfig } from "../ports/client-config"

export type ClientConfigErrorCode =
  | "conflicting_source"
  | "file_read_failed"
  | "credentials_conflict"
  | "malformed_credentials"
  | "invalid_boolean"
  | "invalid_ca_certificate"
  | "invalid_key_pair"
  | "incomplete_key_pair"

export type ClientConfigErrorOptions = {
  context?: ErrorContext
  cause?: unknown
  partial?: ClientConfig
}

/**
 * Raised when the environment does not describe a usable etcd connection.
 */
export class ClientConfigError extends BaseError<ClientConfigErrorCode> {
  /**
   * The configuration as far as it was resolved before the failure.
   * Set when thrown by applyEnvironment; never use it to connect.
   * Non-enumerable, as it may hold credentials.
   */
  declare readonly partial?: ClientConfig

  constructor(
    code: ClientConfigErrorCode,
    message: string,
    options: ClientConfigErrorOptions = {},
  ) {
    super(message, { code, context: options.context, cause: options.cause })

    if (options.partial) {
      Object.defineProperty(this, "partial", { value: options.partial, enumerable: false })
    }
  }

  withPartial(partial: ClientConfig): ClientConfigError {
    return new ClientConfigError(this.code, this.message, {
      context: this.context,
      cause: this.cause,
      partial,
    })
  }
}
