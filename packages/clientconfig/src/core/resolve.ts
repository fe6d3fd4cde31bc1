import type { ClientConfig, TlsConfig } from "../ports/client-config"
import { defaults } from "./defaults"
import { ClientConfigError } from "./errors"
import { parseBool } from "./parse-bool"
import { type LoadSettingsOptions, loadSettings, type Settings } from "./settings"
import { CertificatePool } from "./tls/certificate-pool"
import { type ClientCertificate, parseKeyPair } from "./tls/key-pair"

export type ApplyOptions = LoadSettingsOptions

export type Resolution = {
  config: ClientConfig
  settings: Settings
}

function cloneTls(tls: TlsConfig): TlsConfig {
  return {
    ...tls,
    certificates: [...tls.certificates],
    ...(tls.rootCAs && { rootCAs: tls.rootCAs.clone() }),
  }
}

export function cloneClientConfig(config: ClientConfig): ClientConfig {
  return {
    ...config,
    endpoints: [...config.endpoints],
    ...(config.tls && { tls: cloneTls(config.tls) }),
  }
}

function ensureTls(config: ClientConfig): TlsConfig {
  config.tls ??= { insecureSkipVerify: false, certificates: [] }

  return config.tls
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Like applyEnvironment, but also returns the settings that were read, so
 * callers can report where each value came from.
 */
export function resolveEnvironment(
  config: ClientConfig,
  options: ApplyOptions = {},
): Resolution {
  const c = cloneClientConfig(config)

  let settings: Settings
  try {
    settings = loadSettings(options)
  } catch (err) {
    throw err instanceof ClientConfigError ? err.withPartial(c) : err
  }

  const endpoints = settings.get("ETCD_ENDPOINTS")
  if (endpoints) {
    c.endpoints = endpoints.split(",")
  }

  let username = settings.get("ETCD_USERNAME")
  let password = settings.get("ETCD_PASSWORD")

  const combined = settings.get("ETCD_USERNAME_AND_PASSWORD")
  if (combined) {
    if (username || password) {
      throw new ClientConfigError(
        "credentials_conflict",
        "you can't set both ETCD_USERNAME_AND_PASSWORD and ETCD_USERNAME or ETCD_PASSWORD",
        { context: { variable: "ETCD_USERNAME_AND_PASSWORD" }, partial: c },
      )
    }

    const sep = combined.indexOf(":")
    if (sep === -1) {
      throw new ClientConfigError(
        "malformed_credentials",
        "invalid ETCD_USERNAME_AND_PASSWORD: user and password should be separated with a colon (:)",
        { context: { variable: "ETCD_USERNAME_AND_PASSWORD" }, partial: c },
      )
    }

    username = combined.slice(0, sep)
    password = combined.slice(sep + 1)
  }

  // Not checked for pairing: a lone username or password is applied as is.
  if (username) {
    c.username = username
  }
  if (password) {
    c.password = password
  }

  const skipVerify = settings.get("ETCD_INSECURE_SKIP_VERIFY")
  if (skipVerify) {
    const parsed = parseBool(skipVerify)
    if (parsed === null) {
      throw new ClientConfigError(
        "invalid_boolean",
        `failed to parse ETCD_INSECURE_SKIP_VERIFY as bool (${JSON.stringify(skipVerify)})`,
        { context: { variable: "ETCD_INSECURE_SKIP_VERIFY", value: skipVerify }, partial: c },
      )
    }

    ensureTls(c).insecureSkipVerify = parsed
  }

  const serverCa = settings.get("ETCD_SERVER_CA")
  if (serverCa) {
    const pool = CertificatePool.fromPem(serverCa)
    if (!pool) {
      throw new ClientConfigError(
        "invalid_ca_certificate",
        "certificate(s) in ETCD_SERVER_CA(_FILE) were invalid PEM certificates",
        { context: { variable: "ETCD_SERVER_CA" }, partial: c },
      )
    }

    ensureTls(c).rootCAs = pool
  }

  const clientCert = settings.get("ETCD_CLIENT_CERT")
  const clientKey = settings.get("ETCD_CLIENT_KEY")
  if (clientCert && clientKey) {
    let pair: ClientCertificate
    try {
      pair = parseKeyPair(clientCert, clientKey)
    } catch (err) {
      throw new ClientConfigError(
        "invalid_key_pair",
        `failed to parse ETCD_CLIENT_CERT+ETCD_CLIENT_KEY: ${errorMessage(err)}`,
        { context: { variable: "ETCD_CLIENT_CERT" }, cause: err, partial: c },
      )
    }

    ensureTls(c).certificates = [pair]
  } else if (clientCert || clientKey) {
    throw new ClientConfigError(
      "incomplete_key_pair",
      "either both of ETCD_CLIENT_CERT(_FILE) and ETCD_CLIENT_KEY(_FILE) must be given or neither",
      {
        context: { variable: clientCert ? "ETCD_CLIENT_KEY" : "ETCD_CLIENT_CERT" },
        partial: c,
      },
    )
  }

  return { config: c, settings }
}

/**
 * Reads the ETCD_* environment variables and returns a modified copy of
 * `config`. The input is never mutated.
 *
 * @throws ClientConfigError on the first invalid or conflicting value; its
 * `partial` holds what had been applied up to that point.
 */
export function applyEnvironment(config: ClientConfig, options?: ApplyOptions): ClientConfig {
  return resolveEnvironment(config, options).config
}

/**
 * The environment applied over {@link defaults}.
 */
export function getClientConfig(options?: ApplyOptions): ClientConfig {
  return applyEnvironment(defaults(), options)
}
