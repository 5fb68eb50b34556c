import { toAppError } from "@studydash/errors"
import type { Logger } from "@studydash/logger"
import type { HookFailure, HookPhase, LifecycleHook } from "./lifecycle-hook"

export type RunHooksPolicy = {
  /** Stop after the first failure. Typical for startup. */
  failFast?: boolean
}

/**
 * Runs hooks in order and collects failures. With `failFast` the first
 * failure ends the run.
 */
export async function runHooks(
  phase: HookPhase,
  hooks: readonly LifecycleHook[],
  logger: Logger,
  policy: RunHooksPolicy = {},
): Promise<HookFailure[]> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    try {
      await hook.fn()
      logger.info(`Executed ${phase} hook: ${hook.name}`)
    } catch (err) {
      logger.error(`${phase === "startup" ? "Startup" : "Shutdown"} hook failed: ${hook.name}`, {
        err,
      })
      failures.push({ hook: hook.name, error: toAppError(err, "hook_failed") })

      if (policy.failFast) break
    }
  }

  return failures
}
