/**
 * Content: immutable byte sequence backing a text snapshot.
 *
 * Bytes are owned by the Content and never exposed mutably; slices are copies
 * or read-only views handed to writers.
 */

export const STOP: unique symbol = Symbol("content.stop")
export type Stop = typeof STOP

export type ByteVisitor = (index: number, byte: number) => Stop | void

const DEFAULT_CHUNK_SIZE = 64 * 1024

const toBytes = (input: string | Uint8Array): Uint8Array =>
  typeof input === "string" ? new TextEncoder().encode(input) : Uint8Array.from(input)

export class Content {
  private readonly bytes: Uint8Array

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes
  }

  /** Copies the input, so later changes to a caller's buffer are not observed. */
  static from(input: string | Uint8Array): Content {
    return new Content(toBytes(input))
  }

  /** Takes ownership of `bytes` without copying. Callers must not keep a reference. */
  static adopt(bytes: Uint8Array): Content {
    return new Content(bytes)
  }

  static equal(a: Content, b: Content): boolean {
    if (a === b) return true
    if (a.bytes.length !== b.bytes.length) return false
    for (let i = 0; i < a.bytes.length; i++) {
      if (a.bytes[i] !== b.bytes[i]) return false
    }
    return true
  }

  get length(): number {
    return this.bytes.length
  }

  slice(start: number, end: number = this.bytes.length): Uint8Array {
    return this.bytes.slice(clamp(start, this.bytes.length), clamp(end, this.bytes.length))
  }

  /**
   * Forward traversal from `start`. The visitor may return STOP to end the
   * walk early. Returns the index the walk stopped at (length when it ran out).
   */
  foreach(start: number, visitor: ByteVisitor): number {
    for (let i = clamp(start, this.bytes.length); i < this.bytes.length; i++) {
      if (visitor(i, this.bytes[i] ?? 0) === STOP) return i
    }
    return this.bytes.length
  }

  /** Lazily yields read-only views of `[start, end)` in chunks of at most `size` bytes. */
  *chunks(start = 0, end: number = this.bytes.length, size = DEFAULT_CHUNK_SIZE): Generator<Uint8Array> {
    const from = clamp(start, this.bytes.length)
    const to = clamp(end, this.bytes.length)
    for (let offset = from; offset < to; offset += size) {
      yield this.bytes.subarray(offset, Math.min(offset + size, to))
    }
  }

  /** Builds new content with `[start, end)` replaced by `insert`. */
  splice(start: number, end: number, insert: Uint8Array): Content {
    const from = clamp(start, this.bytes.length)
    const to = Math.max(from, clamp(end, this.bytes.length))
    const next = new Uint8Array(this.bytes.length - (to - from) + insert.length)
    next.set(this.bytes.subarray(0, from), 0)
    next.set(insert, from)
    next.set(this.bytes.subarray(to), from + insert.length)
    return new Content(next)
  }

  toString(): string {
    return new TextDecoder().decode(this.bytes)
  }
}

const clamp = (value: number, length: number): number => Math.max(0, Math.min(value, length))
