import {
  type CacheCategory,
  createJsonCodec,
  createSuperjsonCodec,
  type Seconds,
} from "@studydash/cache"
import {
  analysisCategory,
  KNOWLEDGE_MAP_CATEGORY,
  STUDY_STATS_CATEGORY,
  USER_CATEGORY,
} from "../keyspace"
import {
  type AnalysisResult,
  analysisResultSchema,
  type KnowledgeMapGraph,
  knowledgeMapGraphSchema,
  type StudyStatistics,
  studyStatisticsSchema,
  type UserSessionData,
  userSessionDataSchema,
} from "./study-cache.model"

export type StudyCacheTtls = {
  user: Seconds
  knowledgeMap: Seconds
  analysis: Seconds
  studyStats: Seconds
}

export type StudyCacheCategories = {
  user: CacheCategory<UserSessionData>
  knowledgeMap: CacheCategory<KnowledgeMapGraph>
  studyStats: CacheCategory<StudyStatistics>
  analysis(analysisType: string): CacheCategory<AnalysisResult>
}

export const DEFAULT_STUDY_CACHE_TTLS: StudyCacheTtls = {
  user: 3600,
  knowledgeMap: 3600,
  analysis: 1800,
  studyStats: 3600,
}

export function createStudyCacheCategories(
  ttl: StudyCacheTtls = DEFAULT_STUDY_CACHE_TTLS,
): StudyCacheCategories {
  const analysisCodec = createJsonCodec(analysisResultSchema)

  return {
    user: {
      name: USER_CATEGORY,
      codec: createJsonCodec(userSessionDataSchema),
      defaultTtl: ttl.user,
    },
    knowledgeMap: {
      name: KNOWLEDGE_MAP_CATEGORY,
      codec: createSuperjsonCodec(knowledgeMapGraphSchema),
      defaultTtl: ttl.knowledgeMap,
    },
    studyStats: {
      name: STUDY_STATS_CATEGORY,
      codec: createJsonCodec(studyStatisticsSchema),
      defaultTtl: ttl.studyStats,
    },
    analysis: (analysisType) => ({
      name: analysisCategory(analysisType),
      codec: analysisCodec,
      defaultTtl: ttl.analysis,
    }),
  }
}
