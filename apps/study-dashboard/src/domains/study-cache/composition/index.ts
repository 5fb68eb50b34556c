import {
  CacheInvalidator,
  CacheStore,
  createCacheNamespace,
} from "@studydash/cache"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import {
  createStudyCacheCategories,
  type StudyCacheCategories,
} from "../model/study-cache.categories"
import { StudyCache } from "../services/study-cache"
import { StudyCacheInvalidator } from "../services/study-cache-invalidator"

export type StudyCacheServices = {
  categories: StudyCacheCategories
  store: CacheStore
  invalidator: CacheInvalidator
  studyCache: StudyCache
  studyCacheInvalidator: StudyCacheInvalidator
}

export function createStudyCacheServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): StudyCacheServices {
  const namespace = createCacheNamespace(config.cache.namespace)
  const categories = createStudyCacheCategories(config.cache.ttl)

  const store = new CacheStore({ backend: infra.cacheBackend, namespace, logger: core.logger })
  const invalidator = new CacheInvalidator({ store, logger: core.logger })

  return {
    categories,
    store,
    invalidator,
    studyCache: new StudyCache({ store, categories }),
    studyCacheInvalidator: new StudyCacheInvalidator({ invalidator, namespace }),
  }
}
