/**
 * Every variable read from the environment. Each may instead be given as
 * `<NAME>_FILE`, naming a file that holds the value.
 */
export const ETCD_VARIABLES = [
  "ETCD_ENDPOINTS",
  "ETCD_USERNAME",
  "ETCD_PASSWORD",
  "ETCD_USERNAME_AND_PASSWORD",
  "ETCD_INSECURE_SKIP_VERIFY",
  "ETCD_SERVER_CA",
  "ETCD_CLIENT_CERT",
  "ETCD_CLIENT_KEY",
] as const

export type EtcdVariable = (typeof ETCD_VARIABLES)[number]

export const FILE_SUFFIX = "_FILE"
