/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen once, in `loadConfig`,
 * against the merged result. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Name recorded as provenance, e.g. `env` or `dotenv:.env.test`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
