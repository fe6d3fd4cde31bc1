import type { CertificatePool } from "../core/tls/certificate-pool"
import type { ClientCertificate } from "../core/tls/key-pair"

export type Milliseconds = number

/**
 * TLS settings for the etcd client.
 *
 * Only allocated once an ETCD_INSECURE_SKIP_VERIFY, ETCD_SERVER_CA or
 * ETCD_CLIENT_CERT/ETCD_CLIENT_KEY value has been applied.
 */
export type TlsConfig = {
  insecureSkipVerify: boolean

  /**
   * Trusted roots for the server certificate.
   * Undefined means the platform trust store.
   */
  rootCAs?: CertificatePool

  /** Client certificates presented to the server (zero or one) */
  certificates: ClientCertificate[]
}

/**
 * Connection settings handed to an etcd client.
 */
export type ClientConfig = {
  /** e.g. ["https://etcd-0:2379", "https://etcd-1:2379"] */
  endpoints: string[]

  username?: string
  password?: string

  /** Undefined keeps the connection in plaintext */
  tls?: TlsConfig

  dialTimeoutMs: Milliseconds

  /** How often the client refreshes cluster membership */
  autoSyncIntervalMs: Milliseconds
}
