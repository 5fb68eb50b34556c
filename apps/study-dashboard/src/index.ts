export type { AppConfig } from "./app/config"
export { loadAppConfig } from "./app/config"
export { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"
export { StartupError } from "./app/lifecycle/startup-error"
export { type RunningApp, run } from "./app/run"
export { createStudyCacheServices, type StudyCacheServices } from "./domains/study-cache/composition"
export {
  createStudyCacheCategories,
  DEFAULT_STUDY_CACHE_TTLS,
  type StudyCacheCategories,
  type StudyCacheTtls,
} from "./domains/study-cache/model/study-cache.categories"
export type {
  AnalysisResult,
  KnowledgeMapGraph,
  KnowledgeNode,
  StudyStatistics,
  UserSessionData,
} from "./domains/study-cache/model/study-cache.model"
export { StudyCache } from "./domains/study-cache/services/study-cache"
export {
  type KnowledgeMapLink,
  StudyCacheInvalidator,
} from "./domains/study-cache/services/study-cache-invalidator"
