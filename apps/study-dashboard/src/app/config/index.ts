export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, CacheBackendKind, EnvConfig } from "./schema"
