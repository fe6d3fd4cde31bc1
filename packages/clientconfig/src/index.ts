export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export {
  ProcessEnvSource,
  type ProcessEnvSourceOptions,
} from "./adapters/env/process-env-source"
export { LayeredEnvSource } from "./adapters/layered/layered-env-source"
export {
  DEFAULT_AUTO_SYNC_INTERVAL_MS,
  DEFAULT_DIAL_TIMEOUT_MS,
  defaults,
} from "./core/defaults"
export {
  type CertificateSummary,
  type ClientConfigSummary,
  describeClientConfig,
  REDACTED,
} from "./core/describe"
export {
  ClientConfigError,
  type ClientConfigErrorCode,
  type ClientConfigErrorOptions,
} from "./core/errors"
export { parseBool } from "./core/parse-bool"
export {
  type ApplyOptions,
  applyEnvironment,
  cloneClientConfig,
  getClientConfig,
  type Resolution,
  resolveEnvironment,
} from "./core/resolve"
export {
  type LoadSettingsOptions,
  loadSettings,
  type ReadFile,
  type SettingEntry,
  Settings,
} from "./core/settings"
export { CertificatePool } from "./core/tls/certificate-pool"
export { toTlsConnectionOptions } from "./core/tls/connection-options"
export { type ClientCertificate, parseKeyPair } from "./core/tls/key-pair"
export { decodePemBlocks, type PemBlock } from "./core/tls/pem"
export { TlsMaterialError } from "./core/tls/tls-material-error"
export { ETCD_VARIABLES, type EtcdVariable, FILE_SUFFIX } from "./core/variables"
export { type PrintClientConfigDeps, printClientConfig } from "./dev/print-config"
export type { ClientConfig, Milliseconds, TlsConfig } from "./ports/client-config"
export type { EnvSource } from "./ports/env-source"
