import { quitRedisClients } from "@studydash/cache"
import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./lifecycle-hook"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { redisClients } = context.infra
  if (redisClients === null) return []

  return [
    {
      name: "stop:redis",
      fn: async () => {
        await quitRedisClients(redisClients)
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
