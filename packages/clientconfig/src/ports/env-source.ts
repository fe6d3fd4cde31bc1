/**
 * Read-only lookup of environment variables.
 *
 * The resolver only ever reads through this port, so tests and embedding
 * tools can supply their own environment instead of touching process.env.
 */
export interface EnvSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "dotenv:.env"
   */
  readonly name: string

  /** Value of `key`, or undefined when the source does not define it. */
  get(key: string): string | undefined

  /** Name of the source that supplies `key`, or undefined when none does. */
  originOf(key: string): string | undefined
}
