export type LogContext = {
  service: string
  module: string
  env: string

  /** Environment variable a log line is about, e.g. ETCD_SERVER_CA */
  variable: string

  /** Where a value came from: "env", "dotenv:.env", "file:/run/secrets/ca.pem" */
  origin: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a logger's bindings by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
