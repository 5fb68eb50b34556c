import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@studydash/config"
import { applyOverrides, type DeepPartial } from "../../lib/apply-overrides"
import type { AppConfig } from "."
import { type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    redis: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      database: env.REDIS_DB,
      connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
      connectRetries: env.REDIS_CONNECT_RETRIES,
      ...(env.REDIS_PASSWORD !== undefined && { password: env.REDIS_PASSWORD }),
    },
    cache: {
      backend: env.CACHE_BACKEND,
      namespace: env.CACHE_NAMESPACE,
      deleteBatchSize: env.CACHE_DELETE_BATCH_SIZE,
      ttl: {
        user: env.CACHE_USER_TTL_SECONDS,
        knowledgeMap: env.CACHE_KNOWLEDGE_MAP_TTL_SECONDS,
        analysis: env.CACHE_ANALYSIS_TTL_SECONDS,
        studyStats: env.CACHE_STATS_TTL_SECONDS,
      },
    },
  }
}

/**
 * Loads `.env.{NODE_ENV}` (optional) under `cwd`, then the process
 * environment on top of it.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  const config = mapEnvToConfig(result.value)

  return overrides ? applyOverrides(config, overrides) : config
}
