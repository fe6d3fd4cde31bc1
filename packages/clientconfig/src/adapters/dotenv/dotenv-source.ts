import { readFileSync } from "node:fs"
import path from "node:path"
import { parse } from "dotenv"
import type { EnvSource } from "../../ports/env-source"

/**
 * Options for creating a dotenv environment source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", "./deploy/etcd.env"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: the constructor throws if the file is missing.
   * - `false`: a missing file behaves as an empty one.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Environment read from a .env file. The file is read once, when the source
 * is constructed.
 */
export class DotenvSource implements EnvSource {
  readonly name: string
  private readonly values: Readonly<Record<string, string>>

  constructor(opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
    this.values = DotenvSource.read(opts)
  }

  private static read(opts: DotenvSourceOptions): Record<string, string> {
    const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

    try {
      return parse(readFileSync(filePath, "utf-8"))
    } catch (err) {
      if (!opts.required && (err as NodeJS.ErrnoException).code === "ENOENT") {
        return {}
      }
      throw err
    }
  }

  get(key: string): string | undefined {
    return this.values[key]
  }

  originOf(key: string): string | undefined {
    return this.get(key) === undefined ? undefined : this.name
  }
}
