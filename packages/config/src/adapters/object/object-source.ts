import type { ConfigSource } from "../../ports/source"

/**
 * In-code values, typically test or CLI overrides applied after env.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
