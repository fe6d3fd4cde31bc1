import type { ClientConfig } from "../ports/client-config"

export const REDACTED = "[redacted]"

export type CertificateSummary = {
  subject: string
  issuer: string
  validTo: string
}

export type ClientConfigSummary = {
  endpoints: string[]
  username: string | null
  password: typeof REDACTED | null
  tls: {
    insecureSkipVerify: boolean
    /** null when the platform trust store is used */
    rootCAs: string[] | null
    clientCertificates: CertificateSummary[]
  } | null
  dialTimeoutMs: number
  autoSyncIntervalMs: number
}

/**
 * JSON-safe view of a configuration for logs and diagnostics. The password
 * and private keys never appear in it.
 */
export function describeClientConfig(config: ClientConfig): ClientConfigSummary {
  const { tls } = config

  return {
    endpoints: [...config.endpoints],
    username: config.username ?? null,
    password: config.password ? REDACTED : null,
    tls: tls
      ? {
          insecureSkipVerify: tls.insecureSkipVerify,
          rootCAs: tls.rootCAs ? tls.rootCAs.subjects() : null,
          clientCertificates: tls.certificates.map(({ leaf }) => ({
            subject: leaf.subject,
            issuer: leaf.issuer,
            validTo: leaf.validTo,
          })),
        }
      : null,
    dialTimeoutMs: config.dialTimeoutMs,
    autoSyncIntervalMs: config.autoSyncIntervalMs,
  }
}
