/**
 * Raw configuration values from one place (process env, a dotenv file, overrides).
 *
 * Sources only load. Coercion and validation happen in the schema; later
 * sources override earlier ones.
 */
export interface ConfigSource {
  /** Shown in errors, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
