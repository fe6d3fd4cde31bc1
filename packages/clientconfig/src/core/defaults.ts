import type { ClientConfig } from "../ports/client-config"

export const DEFAULT_DIAL_TIMEOUT_MS = 15_000
export const DEFAULT_AUTO_SYNC_INTERVAL_MS = 5 * 60_000

/**
 * Baseline configuration: no endpoints, no credentials, no TLS.
 *
 * Adjust the result before passing it to applyEnvironment to change the
 * defaults the environment is layered over.
 */
export function defaults(): ClientConfig {
  return {
    endpoints: [],
    dialTimeoutMs: DEFAULT_DIAL_TIMEOUT_MS,
    autoSyncIntervalMs: DEFAULT_AUTO_SYNC_INTERVAL_MS,
  }
}
