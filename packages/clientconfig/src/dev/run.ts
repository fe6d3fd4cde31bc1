import { logLevelNames, PinoLogger } from "@etcd-env/logger"
import { z } from "zod"
import { ProcessEnvSource } from "../adapters/env/process-env-source"
import { printClientConfig } from "./print-config"

const RunEnv = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export function run(env: Record<string, string | undefined> = process.env): boolean {
  const parsed = RunEnv.safeParse(env)

  if (!parsed.success) {
    throw new Error(`Invalid logging configuration:\n${z.prettifyError(parsed.error)}`)
  }

  const logger = new PinoLogger(
    {},
    { level: parsed.data.LOG_LEVEL, prettify: parsed.data.LOG_PRETTY },
    { service: "etcd-env" },
  )

  return printClientConfig({ logger, source: new ProcessEnvSource({ env }) })
}

if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    process.exitCode = run() ? 0 : 1
  } catch (err) {
    console.error(err)
    process.exitCode = 1
  }
}
