import type {
  CacheDeleteResult,
  CacheIdentifier,
  CacheReadResult,
  CacheStatsResult,
  CacheStore,
  CacheWriteResult,
  Seconds,
} from "@studydash/cache"
import type { StudyCacheCategories } from "../model/study-cache.categories"
import type {
  AnalysisResult,
  KnowledgeMapGraph,
  StudyStatistics,
  UserSessionData,
} from "../model/study-cache.model"

export type StudyCacheDeps = {
  store: CacheStore
  categories: StudyCacheCategories
}

function valueOf<T>(res: CacheReadResult<T>): T | undefined {
  return res.kind === "hit" ? res.value : undefined
}

/**
 * Typed cache accessors for the dashboard's data domains. Reads resolve to
 * `undefined` on a miss or a backend failure; the store has already logged
 * the failure.
 */
export class StudyCache {
  public constructor(private readonly deps: StudyCacheDeps) {}

  setUserData(userId: CacheIdentifier, data: UserSessionData, ttl?: Seconds): Promise<CacheWriteResult> {
    return this.deps.store.set(this.deps.categories.user, userId, data, ttl)
  }

  async getUserData(userId: CacheIdentifier): Promise<UserSessionData | undefined> {
    return valueOf(await this.deps.store.get(this.deps.categories.user, userId))
  }

  cacheKnowledgeMap(
    mapId: CacheIdentifier,
    graph: KnowledgeMapGraph,
    ttl?: Seconds,
  ): Promise<CacheWriteResult> {
    return this.deps.store.set(this.deps.categories.knowledgeMap, mapId, graph, ttl)
  }

  async getCachedKnowledgeMap(mapId: CacheIdentifier): Promise<KnowledgeMapGraph | undefined> {
    return valueOf(await this.deps.store.get(this.deps.categories.knowledgeMap, mapId))
  }

  cacheAnalysisResults(
    userId: CacheIdentifier,
    analysisType: string,
    results: AnalysisResult,
    ttl?: Seconds,
  ): Promise<CacheWriteResult> {
    return this.deps.store.set(this.deps.categories.analysis(analysisType), userId, results, ttl)
  }

  async getCachedAnalysis(
    userId: CacheIdentifier,
    analysisType: string,
  ): Promise<AnalysisResult | undefined> {
    return valueOf(await this.deps.store.get(this.deps.categories.analysis(analysisType), userId))
  }

  cacheStudyStatistics(
    userId: CacheIdentifier,
    stats: StudyStatistics,
    ttl?: Seconds,
  ): Promise<CacheWriteResult> {
    return this.deps.store.set(this.deps.categories.studyStats, userId, stats, ttl)
  }

  async getCachedStudyStatistics(userId: CacheIdentifier): Promise<StudyStatistics | undefined> {
    return valueOf(await this.deps.store.get(this.deps.categories.studyStats, userId))
  }

  /**
   * Cached statistics, or the result of `load` (which is then cached).
   * Errors from `load` propagate.
   */
  loadStudyStatistics(
    userId: CacheIdentifier,
    load: () => Promise<StudyStatistics>,
  ): Promise<StudyStatistics> {
    return this.deps.store.getThrough(this.deps.categories.studyStats, userId, load)
  }

  /** Drops every category's entries for identifiers starting with `userId`. */
  invalidateUserCache(userId: CacheIdentifier): Promise<CacheDeleteResult> {
    return this.deps.store.invalidateDomain(userId)
  }

  clearAll(): Promise<CacheWriteResult> {
    return this.deps.store.clearAll()
  }

  stats(): Promise<CacheStatsResult> {
    return this.deps.store.stats()
  }
}
