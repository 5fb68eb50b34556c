import superjson from "superjson"
import type { ZodMiniType } from "zod/mini"
import type { BinaryCodec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Binary codec for graph-shaped values. superjson keeps `Map`, `Set`,
 * `Date`, `BigInt` and repeated references intact; the result travels as
 * raw bytes.
 */
export function createSuperjsonCodec<T>(schema?: ZodMiniType<T>): BinaryCodec<T> {
  return {
    format: "binary",
    encode: (value) => encoder.encode(superjson.stringify(value)),
    decode: (bytes) => {
      const text = decoder.decode(bytes)

      return schema ? schema.parse(superjson.parse(text)) : superjson.parse<T>(text)
    },
  }
}
