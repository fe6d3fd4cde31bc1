import { serializeError } from "@etcd-env/errors"
import { type Logger, NullLogger } from "@etcd-env/logger"
import { describeClientConfig } from "../core/describe"
import { defaults } from "../core/defaults"
import { type ApplyOptions, resolveEnvironment } from "../core/resolve"

export type PrintClientConfigDeps = ApplyOptions & {
  /** Defaults to a NullLogger */
  logger?: Logger
}

/**
 * Resolves the client configuration from the environment and logs a redacted
 * summary, or the error that stopped resolution.
 *
 * @returns whether the configuration resolved.
 */
export function printClientConfig({
  logger = new NullLogger(),
  ...options
}: PrintClientConfigDeps = {}): boolean {
  const log = logger.child({ module: "clientconfig" })

  try {
    const { config, settings } = resolveEnvironment(defaults(), options)

    for (const variable of settings.names()) {
      log.debug("variable set", { variable, origin: settings.explain(variable) })
    }
    log.info("resolved etcd client configuration", { config: describeClientConfig(config) })

    return true
  } catch (err) {
    log.error("failed to resolve etcd client configuration", { err: serializeError(err) })

    return false
  }
}
