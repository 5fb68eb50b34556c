import { connectRedisClients } from "@studydash/cache"
import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./lifecycle-hook"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { redisClients } = context.infra
  const hooks: LifecycleHook[] = []

  if (redisClients !== null) {
    hooks.push({
      name: "start:redis",
      fn: async () => {
        await connectRedisClients(redisClients)
      },
    })
  }

  hooks.push({
    name: "start:cache:stats",
    fn: async () => {
      const res = await context.services.domains.studyCache.store.stats()
      if (res.kind === "failed") throw res.error

      context.services.core.logger.info("Cache backend ready", { ...res.stats })
    },
  })

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
