import { readFileSync } from "node:fs"
import { ProcessEnvSource } from "../adapters/env/process-env-source"
import type { EnvSource } from "../ports/env-source"
import { ClientConfigError } from "./errors"
import { ETCD_VARIABLES, type EtcdVariable, FILE_SUFFIX } from "./variables"

export type ReadFile = (path: string) => string

export type LoadSettingsOptions = {
  /** @default new ProcessEnvSource() */
  source?: EnvSource

  /** Reads `_FILE` values. @default UTF-8 readFileSync */
  readFile?: ReadFile
}

export type SettingEntry = {
  readonly value: string
  /** Source name for direct values, "file:<path>" for `_FILE` values */
  readonly origin: string
}

export class Settings {
  constructor(private readonly entries: ReadonlyMap<EtcdVariable, SettingEntry>) {}

  get(name: EtcdVariable): string | undefined {
    return this.entries.get(name)?.value
  }

  has(name: EtcdVariable): boolean {
    return this.entries.has(name)
  }

  explain(name: EtcdVariable): string | undefined {
    return this.entries.get(name)?.origin
  }

  names(): EtcdVariable[] {
    return [...this.entries.keys()]
  }
}

const readUtf8: ReadFile = (path) => readFileSync(path, "utf-8")

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function readValueFile(name: EtcdVariable, file: string, readFile: ReadFile): string {
  try {
    return readFile(file)
  } catch (err) {
    throw new ClientConfigError(
      "file_read_failed",
      `error reading ${JSON.stringify(file)} (for ${name}${FILE_SUFFIX}): ${errorMessage(err)}`,
      { context: { variable: name, file }, cause: err },
    )
  }
}

/**
 * Reads every recognized variable, directly or through its `_FILE` sibling.
 *
 * Empty values, from either form, count as unset. Names set in neither form are
 * left out.
 *
 * @throws ClientConfigError `conflicting_source` when both forms are set,
 * `file_read_failed` when a `_FILE` cannot be read.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const source = options.source ?? new ProcessEnvSource()
  const readFile = options.readFile ?? readUtf8
  const entries = new Map<EtcdVariable, SettingEntry>()

  for (const name of ETCD_VARIABLES) {
    const direct = source.get(name)
    const file = source.get(`${name}${FILE_SUFFIX}`)

    if (direct && file) {
      throw new ClientConfigError(
        "conflicting_source",
        `conflicting value for ${name}: both ${name} and ${name}${FILE_SUFFIX} are set`,
        { context: { variable: name } },
      )
    }

    if (direct) {
      entries.set(name, { value: direct, origin: source.originOf(name) ?? source.name })
    } else if (file) {
      const value = readValueFile(name, file, readFile)
      if (value) entries.set(name, { value, origin: `file:${file}` })
    }
  }

  return new Settings(entries)
}
