import { type AppContext, type AppContextOptions, createAppContext } from "./create-context"
import type { HookFailure } from "./lifecycle/lifecycle-hook"
import { runHooks } from "./lifecycle/run-hooks"
import { StartupError } from "./lifecycle/startup-error"

export type RunningApp = {
  ctx: AppContext
  stop(): Promise<HookFailure[]>
}

/**
 * Builds the context and runs the start hooks. When a start hook fails the
 * stop hooks run before the {@link StartupError} is thrown.
 */
export async function run(options: AppContextOptions = {}): Promise<RunningApp> {
  const ctx = await createAppContext(options)
  const { logger } = ctx.services.core

  const stop = (): Promise<HookFailure[]> =>
    runHooks("shutdown", ctx.createStopHooks(ctx), logger)

  const failures = await runHooks("startup", ctx.createStartHooks(ctx), logger, {
    failFast: true,
  })

  if (failures.length > 0) {
    await stop()
    throw new StartupError(failures)
  }

  logger.info("Study dashboard cache started", {
    backend: ctx.config.cache.backend,
    namespace: ctx.config.cache.namespace,
  })

  return { ctx, stop }
}
