/**
 * Encodes structured values as text. Text payloads stay readable with
 * `redis-cli` and travel over the string connection.
 */
export interface TextCodec<T> {
  readonly format: "text"
  encode(value: T): string
  decode(text: string): T
}

/**
 * Encodes arbitrary object graphs (maps, sets, dates) as opaque bytes that
 * travel over the raw connection.
 */
export interface BinaryCodec<T> {
  readonly format: "binary"
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}

export type CacheCodec<T> = TextCodec<T> | BinaryCodec<T>

export type PayloadFormat = CacheCodec<unknown>["format"]
