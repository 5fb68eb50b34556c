import { NullLogger } from "@studydash/logger"
import type { MockProxy } from "vitest-mock-extended"
import { mock } from "vitest-mock-extended"
import { z } from "zod/mini"
import { MemoryCacheBackend } from "../../../adapters/memory/memory-cache-backend"
import { CacheError } from "../../../errors/cache-error"
import type { CacheBackend } from "../../../ports/cache-backend"
import type { CacheCategory } from "../../../ports/cache-category"
import type { TextCodec } from "../../../ports/codec"
import { T0 } from "../../../tests/utils/cache-test-helpers"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { createJsonCodec } from "../../codec/json-codec"
import { createSuperjsonCodec } from "../../codec/superjson-codec"
import { createCacheNamespace } from "../../namespace/create-cache-namespace"
import { CacheStore } from "../cache-store"

const stats: CacheCategory<Record<string, number>> = {
  name: "study_stats",
  codec: createJsonCodec(z.record(z.string(), z.number())),
  defaultTtl: 3600,
}

type Graph = { nodes: Map<string, string>; edges: Set<string> }

const maps: CacheCategory<Graph> = {
  name: "knowledge_map",
  codec: createSuperjsonCodec<Graph>(),
  defaultTtl: 3600,
}

const trend: CacheCategory<{ slope: number }> = {
  name: "analysis:trend",
  codec: createJsonCodec(z.object({ slope: z.number() })),
  defaultTtl: 1800,
}

const namespace = createCacheNamespace("study_tracker")

describe("CacheStore", () => {
  let clock: ManualTestClock
  let backend: MemoryCacheBackend
  let store: CacheStore

  beforeEach(() => {
    clock = new ManualTestClock(T0)
    backend = new MemoryCacheBackend({ clock })
    store = new CacheStore({ backend, namespace, logger: new NullLogger() })
  })

  describe("set/get", () => {
    it("round-trips a text value", async () => {
      expect(await store.set(stats, 7, { math: 90 }, 3600)).toStrictEqual({ kind: "ok" })

      expect(await store.get(stats, 7)).toStrictEqual({ kind: "hit", value: { math: 90 } })
    })

    it("round-trips a binary value", async () => {
      const graph: Graph = { nodes: new Map([["a", "Algebra"]]), edges: new Set(["a->b"]) }

      await store.set(maps, "m1", graph)

      expect(await store.get(maps, "m1")).toStrictEqual({ kind: "hit", value: graph })
    })

    it("writes under the namespaced key", async () => {
      await store.set(trend, 7, { slope: 0.5 })

      expect(await backend.getText("study_tracker:analysis:trend:7")).toBe('{"slope":0.5}')
    })

    it("stores binary categories as bytes", async () => {
      const setBytes = vi.spyOn(backend, "setBytes")

      await store.set(maps, "m1", { nodes: new Map(), edges: new Set() }, 60)

      expect(setBytes).toHaveBeenCalledWith("study_tracker:knowledge_map:m1", expect.any(Uint8Array), 60)
    })

    it("reads a never-written key as a miss", async () => {
      expect(await store.get(stats, "never")).toStrictEqual({ kind: "miss" })
    })

    it("reads a miss once the TTL has elapsed", async () => {
      await store.set(stats, 7, { math: 90 }, 5)

      clock.advanceSeconds(5)

      expect(await store.get(stats, 7)).toStrictEqual({ kind: "miss" })
    })

    it("applies the category TTL when none is given", async () => {
      await store.set(trend, 7, { slope: 1 })

      clock.advanceSeconds(1799)
      expect((await store.get(trend, 7)).kind).toBe("hit")

      clock.advanceSeconds(1)
      expect((await store.get(trend, 7)).kind).toBe("miss")
    })

    it.each([0, -5, 1.5, Number.NaN])("rejects TTL %s without touching the backend", async (ttl) => {
      const setText = vi.spyOn(backend, "setText")

      const res = await store.set(stats, 7, { math: 90 }, ttl)

      expect(res.kind).toBe("failed")
      if (res.kind === "failed") expect(res.error.code).toBe("invalid_ttl")
      expect(setText).not.toHaveBeenCalled()
    })

    it("reports a value the codec cannot encode as encode_failed", async () => {
      const throwing: TextCodec<bigint> = {
        format: "text",
        encode: (value) => JSON.stringify(value),
        decode: (text) => BigInt(text),
      }

      const res = await store.set({ name: "big", codec: throwing, defaultTtl: 60 }, 1, 1n)

      expect(res.kind).toBe("failed")
      if (res.kind === "failed") expect(res.error.code).toBe("encode_failed")
    })

    it("treats an undecodable payload as a miss", async () => {
      await backend.setText("study_tracker:study_stats:7", "{broken", 60)

      expect(await store.get(stats, 7)).toStrictEqual({ kind: "miss" })
    })

    it("treats a payload of the wrong shape as a miss", async () => {
      await backend.setText("study_tracker:study_stats:7", '{"math":"A"}', 60)

      expect(await store.get(stats, 7)).toStrictEqual({ kind: "miss" })
    })
  })

  describe("getThrough", () => {
    it("returns the cached value without calling the loader", async () => {
      await store.set(stats, 7, { math: 90 })
      const loader = vi.fn(async () => ({ math: 10 }))

      expect(await store.getThrough(stats, 7, loader)).toStrictEqual({ math: 90 })
      expect(loader).not.toHaveBeenCalled()
    })

    it("loads and repopulates on a miss", async () => {
      const loader = vi.fn(async () => ({ math: 55 }))

      expect(await store.getThrough(stats, 7, loader)).toStrictEqual({ math: 55 })
      expect(await store.get(stats, 7)).toStrictEqual({ kind: "hit", value: { math: 55 } })
    })

    it("propagates loader errors", async () => {
      const loader = vi.fn(async (): Promise<Record<string, number>> => {
        throw new Error("db down")
      })

      await expect(store.getThrough(stats, 7, loader)).rejects.toThrow("db down")
    })
  })

  describe("deletion", () => {
    beforeEach(async () => {
      await store.set(stats, 42, { math: 1 })
      await store.set(stats, 420, { math: 2 })
      await store.set(trend, 42, { slope: 1 })
      await store.set(stats, 7, { math: 3 })
    })

    it("invalidateDomain removes every category for identifiers starting with the id", async () => {
      const res = await store.invalidateDomain(42)

      expect(res).toStrictEqual({ kind: "ok", deleted: 3 })
      expect(await store.get(stats, 7)).toStrictEqual({ kind: "hit", value: { math: 3 } })
      expect(await backend.keys("*")).toStrictEqual(["study_tracker:study_stats:7"])
    })

    it("deleteKeys removes exactly the listed keys", async () => {
      const res = await store.deleteKeys([
        store.keyFor("study_stats", 42),
        store.keyFor("study_stats", "missing"),
      ])

      expect(res).toStrictEqual({ kind: "ok", deleted: 1 })
      expect((await store.get(stats, 420)).kind).toBe("hit")
    })

    it("deleteKeys with no keys is ok without a backend call", async () => {
      const del = vi.spyOn(backend, "delete")

      expect(await store.deleteKeys([])).toStrictEqual({ kind: "ok", deleted: 0 })
      expect(del).not.toHaveBeenCalled()
    })

    it("deleteMatching with zero matches is ok and leaves the store unchanged", async () => {
      const res = await store.deleteMatching(store.patternFor("user", "*"))

      expect(res).toStrictEqual({ kind: "ok", deleted: 0 })
      expect(await backend.keys("*")).toHaveLength(4)
    })

    it("clearAll empties the store", async () => {
      expect(await store.clearAll()).toStrictEqual({ kind: "ok" })
      expect(await backend.keys("*")).toStrictEqual([])
    })
  })

  describe("stats", () => {
    it("reports backend statistics", async () => {
      await store.set(stats, 7, { math: 90 })

      const res = await store.stats()

      expect(res.kind).toBe("ok")
      if (res.kind === "ok") expect(res.stats.keyCount).toBe(1)
    })
  })

  describe("when the backend fails", () => {
    let failing: MockProxy<CacheBackend>
    let failingStore: CacheStore

    beforeEach(() => {
      failing = mock<CacheBackend>()
      const down = new Error("ECONNREFUSED")
      failing.setText.mockRejectedValue(down)
      failing.setBytes.mockRejectedValue(down)
      failing.getText.mockRejectedValue(down)
      failing.getBytes.mockRejectedValue(down)
      failing.delete.mockRejectedValue(down)
      failing.keys.mockRejectedValue(down)
      failing.flush.mockRejectedValue(down)
      failing.stats.mockRejectedValue(down)

      failingStore = new CacheStore({ backend: failing, namespace, logger: new NullLogger() })
    })

    it("never throws and reports backend_unavailable", async () => {
      const results = [
        await failingStore.set(stats, 7, { math: 90 }),
        await failingStore.set(maps, 1, { nodes: new Map(), edges: new Set() }),
        await failingStore.get(stats, 7),
        await failingStore.get(maps, 1),
        await failingStore.deleteKeys(["k"]),
        await failingStore.deleteMatching("study_tracker:*"),
        await failingStore.invalidateDomain(7),
        await failingStore.clearAll(),
        await failingStore.stats(),
      ]

      for (const res of results) {
        expect(res.kind).toBe("failed")
        if (res.kind === "failed") {
          expect(res.error).toBeInstanceOf(CacheError)
          expect(res.error.code).toBe("backend_unavailable")
          expect(res.error.isRetryable).toBe(true)
        }
      }
    })

    it("records the operation and key on the error", async () => {
      const res = await failingStore.get(stats, 7)

      if (res.kind !== "failed") throw new Error(`expected failure, got ${res.kind}`)
      expect(res.error.context).toStrictEqual({
        operation: "get",
        key: "study_tracker:study_stats:7",
      })
      expect(res.error.cause).toBeInstanceOf(Error)
    })

    it("getThrough falls back to the loader", async () => {
      expect(await failingStore.getThrough(stats, 7, async () => ({ math: 1 }))).toStrictEqual({
        math: 1,
      })
    })

    it("logs backend failures at error level", async () => {
      const logger = new NullLogger()
      const child = new NullLogger()
      const childSpy = vi.spyOn(logger, "child").mockReturnValue(child)
      const errorSpy = vi.spyOn(child, "error")

      const logged = new CacheStore({ backend: failing, namespace, logger })
      await logged.get(stats, 7)

      expect(childSpy).toHaveBeenCalledWith({ module: "cache-store", namespace: "study_tracker" })
      expect(errorSpy).toHaveBeenCalledWith(
        "Cache backend failed during get",
        expect.objectContaining({ key: "study_tracker:study_stats:7", category: "study_stats" }),
      )
    })
  })
})
