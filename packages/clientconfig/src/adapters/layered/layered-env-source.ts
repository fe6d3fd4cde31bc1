import type { EnvSource } from "../../ports/env-source"

/**
 * Combines sources in order; later sources override earlier ones.
 *
 * @example
 * ```ts
 * new LayeredEnvSource([
 *   new DotenvSource({ file: ".env", required: false }),
 *   new ProcessEnvSource(),
 * ])
 * ```
 */
export class LayeredEnvSource implements EnvSource {
  readonly name: string

  constructor(private readonly sources: readonly EnvSource[]) {
    this.name = `layered(${sources.map((s) => s.name).join(",")})`
  }

  private winner(key: string): EnvSource | undefined {
    for (let i = this.sources.length - 1; i >= 0; i--) {
      const source = this.sources[i]
      if (source && source.get(key) !== undefined) return source
    }

    return undefined
  }

  get(key: string): string | undefined {
    return this.winner(key)?.get(key)
  }

  originOf(key: string): string | undefined {
    return this.winner(key)?.originOf(key)
  }
}
