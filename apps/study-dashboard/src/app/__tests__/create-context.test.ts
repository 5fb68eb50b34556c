import { MemoryCacheBackend, RedisCacheBackend } from "@studydash/cache"
import { NullLogger } from "@studydash/logger"
import { createTestHarness } from "../../tests/test-harness"
import { createAppContext } from "../create-context"

describe("createAppContext", () => {
  it("wires the redis backend with unopened clients by default", async () => {
    const ctx = await createAppContext({
      env: { NODE_ENV: "test" },
      coreOverrides: { logger: new NullLogger() },
    })

    expect(ctx.infra.cacheBackend).toBeInstanceOf(RedisCacheBackend)
    expect(ctx.infra.redisClients?.text.isOpen).toBe(false)
    expect(ctx.createStopHooks(ctx).map((h) => h.name)).toStrictEqual(["stop:redis"])
  })

  it("uses the in-process backend when configured", async () => {
    const ctx = await createAppContext({
      env: { NODE_ENV: "test", CACHE_BACKEND: "memory", CACHE_NAMESPACE: "dash" },
      coreOverrides: { logger: new NullLogger() },
    })

    expect(ctx.infra.cacheBackend).toBeInstanceOf(MemoryCacheBackend)
    expect(ctx.infra.redisClients).toBeNull()
    expect(ctx.services.domains.studyCache.store.keyFor("user", 1)).toBe("dash:user:1")
    expect(ctx.createStartHooks(ctx).map((h) => h.name)).toStrictEqual(["start:cache:stats"])
    expect(ctx.createStopHooks(ctx)).toStrictEqual([])
  })

  it("threads configured TTLs into the study categories", async () => {
    const { ctx } = await createTestHarness({
      configOverrides: { cache: { backend: "memory", ttl: { analysis: 120 } } },
    })

    const { categories } = ctx.services.domains.studyCache

    expect(categories.analysis("trend").defaultTtl).toBe(120)
    expect(categories.user.defaultTtl).toBe(3600)
  })

  it("shares one store between the accessors and the invalidator", async () => {
    const { ctx } = await createTestHarness()
    const { studyCache, studyCacheInvalidator } = ctx.services.domains.studyCache

    await studyCache.cacheStudyStatistics(7, { math: 90 })
    await studyCacheInvalidator.invalidateUserData(7)

    expect(await studyCache.getCachedStudyStatistics(7)).toBeUndefined()
  })
})
