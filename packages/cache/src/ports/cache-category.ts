import type { CacheCodec } from "./codec"
import type { Seconds } from "./time"

/**
 * A data domain inside the namespace.
 *
 * The name becomes the middle key segment and may itself be
 * colon-delimited (`analysis:trend`). The codec decides both the
 * serialization and the backend connection used.
 */
export type CacheCategory<T> = {
  readonly name: string
  readonly codec: CacheCodec<T>
  readonly defaultTtl: Seconds
}
