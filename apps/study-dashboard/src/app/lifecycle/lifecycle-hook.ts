import type { AppError } from "@studydash/errors"

export interface LifecycleHook {
  name: string
  fn: () => Promise<void>
}

export interface HookFailure {
  hook: string
  error: AppError
}

export type HookPhase = "startup" | "shutdown"
