import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod/mini"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { loadConfig } from "../load"

const schema = z.object({
  REDIS_HOST: z._default(z.string(), "localhost"),
  REDIS_PORT: z._default(z.coerce.number(), 6379),
  CACHE_NAMESPACE: z.string(),
})

describe("loadConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "studydash-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("validates, coerces and applies defaults", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { REDIS_PORT: "6380", CACHE_NAMESPACE: "st" } })],
    })

    expect(config.value).toStrictEqual({
      REDIS_HOST: "localhost",
      REDIS_PORT: 6380,
      CACHE_NAMESPACE: "st",
    })
  })

  it("lets later sources override earlier ones and records provenance", async () => {
    await fs.writeFile(
      path.join(cwd, ".env.test"),
      "REDIS_HOST=cache.internal\nCACHE_NAMESPACE=from_file\n",
    )

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env.test", required: true, cwd }),
        new EnvSource({ env: { CACHE_NAMESPACE: "from_env" } }),
      ],
    })

    expect(config.get("REDIS_HOST")).toBe("cache.internal")
    expect(config.get("CACHE_NAMESPACE")).toBe("from_env")
    expect(config.explain("REDIS_HOST")).toBe("dotenv:.env.test")
    expect(config.explain("CACHE_NAMESPACE")).toBe("env")
    expect(config.explain("REDIS_PORT")).toBe("default")
    expect(config.sourcesUsed().sort()).toStrictEqual(["default", "dotenv:.env.test", "env"])
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_NAMESPACE: "st", REDIS_HOTS: "typo" })],
    })

    expect(config.unknownKeys()).toStrictEqual(["REDIS_HOTS"])
  })

  it("skips undefined values so earlier sources keep theirs", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ CACHE_NAMESPACE: "kept" }, "base"),
        new EnvSource({ env: { CACHE_NAMESPACE: undefined } }),
      ],
    })

    expect(config.get("CACHE_NAMESPACE")).toBe("kept")
    expect(config.explain("CACHE_NAMESPACE")).toBe("object:base")
  })

  it("throws with the validation issues when the schema rejects the input", async () => {
    await expect(
      loadConfig({ schema, sources: [new EnvSource({ env: {} })] }),
    ).rejects.toThrow(/Configuration validation failed/)
  })

  it("returns a frozen value", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ CACHE_NAMESPACE: "st" })],
    })

    expect(Object.isFrozen(config.value)).toBe(true)
  })
})
