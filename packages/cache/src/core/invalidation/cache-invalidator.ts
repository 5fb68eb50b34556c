import type { Logger } from "@studydash/logger"
import type { CacheError } from "../../errors/cache-error"
import type { CacheKey, CacheKeyPattern } from "../../ports/cache-key"
import type { CacheDeleteResult, CacheInvalidationResult } from "../../ports/cache-result"
import { DependencyGraph, type DependencyNode } from "./dependency-graph"

export type CacheInvalidatorDeps = {
  store: {
    deleteKeys(keys: readonly CacheKey[]): Promise<CacheDeleteResult>
    deleteMatching(pattern: CacheKeyPattern): Promise<CacheDeleteResult>
  }
  logger: Logger
  graph?: DependencyGraph
}

/**
 * Cascading invalidation over a {@link DependencyGraph}.
 *
 * The graph lives in process memory and is normally populated at startup.
 * Traversal reads a snapshot of each node's dependents, so registrations
 * made mid-invalidation may or may not be seen.
 */
export class CacheInvalidator {
  private readonly graph: DependencyGraph
  private readonly log: Logger

  public constructor(private readonly deps: CacheInvalidatorDeps) {
    this.graph = deps.graph ?? new DependencyGraph()
    this.log = deps.logger.child({ module: "cache-invalidator" })
  }

  /** Edges to literal keys; glob characters in them are not interpreted. */
  registerDependency(key: CacheKey | CacheKeyPattern, dependentKeys: Iterable<CacheKey>): void {
    this.graph.register(key, dependentKeys, "key")
  }

  /** Edges to patterns, resolved against the keyspace at invalidation time. */
  registerPatternDependency(
    key: CacheKey | CacheKeyPattern,
    patterns: Iterable<CacheKeyPattern>,
  ): void {
    this.graph.register(key, patterns, "pattern")
  }

  dependentsOf(key: CacheKey | CacheKeyPattern): DependencyNode[] {
    return this.graph.dependentsOf(key)
  }

  /**
   * Deletes `key` and everything transitively depending on it. `key` and
   * key dependents go out in one batch; pattern dependents are resolved
   * against the keyspace. Every delete is attempted even after a failure;
   * the first error is reported.
   */
  async invalidateWithDependencies(key: CacheKey): Promise<CacheInvalidationResult> {
    const literals = new Set<CacheKey>([key])
    const patterns = new Set<CacheKeyPattern>()
    for (const node of this.graph.dependentsOf(key)) {
      if (node.kind === "pattern") patterns.add(node.value)
      else literals.add(node.value)
    }

    const targets = [...literals, ...patterns]

    const results: CacheDeleteResult[] = []

    for (const literal of literals) {
      this.log.debug("Invalidating cache key", { key: literal })
    }
    results.push(await this.deps.store.deleteKeys([...literals]))

    for (const pattern of patterns) {
      this.log.debug("Invalidating cache pattern", { pattern })
      results.push(await this.deps.store.deleteMatching(pattern))
    }

    let deleted = 0
    let firstError: CacheError | undefined
    for (const res of results) {
      if (res.kind === "ok") deleted += res.deleted
      else firstError ??= res.error
    }

    if (firstError !== undefined) {
      this.log.error("Cascading invalidation incomplete", {
        key,
        targets: targets.length,
        deleted,
        err: firstError,
      })
      return { kind: "failed", targets, deleted, error: firstError }
    }

    this.log.info("Cascading invalidation complete", { key, targets: targets.length, deleted })

    return { kind: "ok", targets, deleted }
  }

  async invalidatePattern(pattern: CacheKeyPattern): Promise<CacheInvalidationResult> {
    const res = await this.deps.store.deleteMatching(pattern)
    const targets = [pattern]

    if (res.kind === "failed") {
      return { kind: "failed", targets, deleted: 0, error: res.error }
    }

    return { kind: "ok", targets, deleted: res.deleted }
  }
}
