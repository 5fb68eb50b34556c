import { prettifyError } from "zod"
import type { ZodMiniType } from "zod/mini"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodMiniType<T>

  /** Applied in order, later sources win. Defaults to `[new EnvSource()]`. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${prettifyError(result.error)}`)
  }

  for (const key of Object.keys(result.data)) {
    provenance[key] ??= "default"
  }

  const known = new Set(Object.keys(result.data))
  const trimmedProvenance = Object.fromEntries(
    Object.entries(provenance).filter(([key]) => known.has(key)),
  )

  return new Config<T>(result.data, trimmedProvenance, new Set(Object.keys(merged)))
}
