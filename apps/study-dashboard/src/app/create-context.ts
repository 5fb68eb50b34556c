import { fileURLToPath } from "node:url"
import { applyOverrides, type DeepPartial } from "../lib/apply-overrides"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type AppServices, createDefaultDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  configOverrides?: DeepPartial<AppConfig>
  coreOverrides?: DeepPartial<CoreServices>
  infraOverrides?: DeepPartial<InfraClients>
  domainOverrides?: DeepPartial<DomainServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    projectRoot,
  )

  const core = applyOverrides(createCoreServices(config), options.coreOverrides)
  const infra = applyOverrides(createDefaultInfraClients(config, core), options.infraOverrides)
  const domains = applyOverrides(
    createDefaultDomainServices(config, infra, core),
    options.domainOverrides,
  )

  return {
    config,
    infra,
    services: { core, domains },
    createStartHooks,
    createStopHooks,
  }
}
