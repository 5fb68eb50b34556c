import {
  type CacheIdentifier,
  type CacheInvalidationResult,
  type CacheInvalidator,
  type CacheKey,
  type CacheKeyPattern,
  type CacheNamespace,
  escapeGlob,
} from "@studydash/cache"
import { ANY_ANALYSIS_CATEGORY, analysisCategory, KNOWLEDGE_MAP_CATEGORY } from "../keyspace"

export type StudyCacheInvalidatorDeps = {
  invalidator: CacheInvalidator
  namespace: CacheNamespace
}

export type KnowledgeMapLink = {
  userId: CacheIdentifier
  /** Analysis types derived from the map. Omit to link every analysis of the user. */
  analysisTypes?: readonly string[]
}

export class StudyCacheInvalidator {
  public constructor(private readonly deps: StudyCacheInvalidatorDeps) {}

  /**
   * Removes `{ns}:*:{userId}*`: every category, and every identifier that
   * starts with `userId` (user 4 also clears user 42).
   */
  invalidateUserData(userId: CacheIdentifier): Promise<CacheInvalidationResult> {
    return this.deps.invalidator.invalidatePattern(
      this.deps.namespace.pattern("*", `${escapeGlob(String(userId))}*`),
    )
  }

  invalidateKnowledgeMap(mapId: CacheIdentifier): Promise<CacheInvalidationResult> {
    return this.deps.invalidator.invalidateWithDependencies(this.knowledgeMapKey(mapId))
  }

  invalidateAnalysisCache(
    userId: CacheIdentifier,
    analysisType?: string,
  ): Promise<CacheInvalidationResult> {
    if (analysisType !== undefined) {
      return this.deps.invalidator.invalidateWithDependencies(
        this.deps.namespace.key(analysisCategory(analysisType), userId),
      )
    }

    return this.deps.invalidator.invalidatePattern(this.allAnalysesOf(userId))
  }

  /**
   * Makes invalidating the knowledge map also invalidate analyses computed
   * from it.
   */
  linkKnowledgeMap(mapId: CacheIdentifier, link: KnowledgeMapLink): void {
    const mapKey = this.knowledgeMapKey(mapId)

    if (link.analysisTypes === undefined) {
      this.deps.invalidator.registerPatternDependency(mapKey, [this.allAnalysesOf(link.userId)])
      return
    }

    this.deps.invalidator.registerDependency(
      mapKey,
      link.analysisTypes.map((t) => this.deps.namespace.key(analysisCategory(t), link.userId)),
    )
  }

  private knowledgeMapKey(mapId: CacheIdentifier): CacheKey {
    return this.deps.namespace.key(KNOWLEDGE_MAP_CATEGORY, mapId)
  }

  private allAnalysesOf(userId: CacheIdentifier): CacheKeyPattern {
    return this.deps.namespace.pattern(ANY_ANALYSIS_CATEGORY, escapeGlob(String(userId)))
  }
}
