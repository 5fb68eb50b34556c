import {
  createStudyCacheServices,
  type StudyCacheServices,
} from "../../domains/study-cache/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  studyCache: StudyCacheServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  return {
    studyCache: createStudyCacheServices(config, core, infra),
  }
}
