import type { ConnectionOptions } from "node:tls"
import type { TlsConfig } from "../../ports/client-config"

/**
 * Maps a TlsConfig onto the options taken by `tls.connect` and gRPC/HTTP2
 * clients built on it.
 */
export function toTlsConnectionOptions(tls: TlsConfig): ConnectionOptions {
  const [client] = tls.certificates

  return {
    rejectUnauthorized: !tls.insecureSkipVerify,
    ...(tls.rootCAs && { ca: tls.rootCAs.toPem() }),
    ...(client && { cert: client.certificatePem, key: client.keyPem }),
  }
}
