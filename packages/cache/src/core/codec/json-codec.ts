import type { ZodMiniType } from "zod/mini"
import type { TextCodec } from "../../ports/codec"

/**
 * JSON text codec. Decoded values are checked against `schema`, so a
 * payload written by an older shape decodes as a failure instead of
 * leaking a mistyped value.
 */
export function createJsonCodec<T>(schema: ZodMiniType<T>): TextCodec<T> {
  return {
    format: "text",
    encode: (value) => JSON.stringify(value),
    decode: (text) => schema.parse(JSON.parse(text)),
  }
}
