import type { EnvSource } from "../../ports/env-source"

export type ProcessEnvSourceOptions = {
  /**
   * Prepended to every lookup: with prefix "APP_", get("ETCD_ENDPOINTS")
   * reads APP_ETCD_ENDPOINTS.
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class ProcessEnvSource implements EnvSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: ProcessEnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  get(key: string): string | undefined {
    return this.env[`${this.prefix}${key}`]
  }

  originOf(key: string): string | undefined {
    return this.get(key) === undefined ? undefined : this.name
  }
}
