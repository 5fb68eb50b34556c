/**
 * Validated configuration plus a record of where each value came from.
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or `default` for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  sourcesUsed(): string[]

  /** Keys some source supplied that the schema does not know. */
  unknownKeys(): string[]
}
