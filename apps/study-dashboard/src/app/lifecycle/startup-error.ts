import { BaseError } from "@studydash/errors"
import type { HookFailure } from "./lifecycle-hook"

export class StartupError extends BaseError<"startup_failed"> {
  constructor(readonly failures: readonly HookFailure[]) {
    super(`Startup failed in ${failures.map((f) => f.hook).join(", ")}`, {
      code: "startup_failed",
      context: { hooks: failures.map((f) => f.hook) },
      ...(failures[0] !== undefined && { cause: failures[0].error }),
    })
  }
}
