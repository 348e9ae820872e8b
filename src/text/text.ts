import { Content } from "./content.js"
import { Cursor } from "./cursor.js"

const NEWLINE = 0x0a

const splitLines = (bytes: Uint8Array): Uint8Array[] => {
  const pieces: Uint8Array[] = []
  let start = 0
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === NEWLINE) {
      pieces.push(bytes.subarray(start, i))
      start = i + 1
    }
  }
  pieces.push(bytes.subarray(start))
  return pieces
}

/** Sorts by start and merges selections that overlap. */
const normalizeCursors = (cursors: readonly Cursor[], length: number): Cursor[] => {
  const sorted = cursors
    .map((cursor) => cursor.clampTo(length))
    .sort((a, b) => a.start().index - b.start().index || a.end().index - b.end().index)
  const merged: Cursor[] = []
  for (const cursor of sorted) {
    const last = merged[merged.length - 1]
    if (last && cursor.start().index < last.end().index) {
      merged[merged.length - 1] = Cursor.range(last.start().index, Math.max(last.end().index, cursor.end().index))
      continue
    }
    merged.push(cursor)
  }
  return merged
}

/**
 * Text: one immutable version of a document, its bytes plus cursor state.
 * Always carries at least one cursor.
 */
export class Text {
  readonly content: Content
  readonly cursors: readonly Cursor[]

  private constructor(content: Content, cursors: readonly Cursor[]) {
    this.content = content
    this.cursors = cursors
  }

  static fromString(input: string | Uint8Array): Text {
    return new Text(Content.from(input), [Cursor.at(0)])
  }

  static fromContent(content: Content): Text {
    return new Text(content, [Cursor.at(0)])
  }

  withCursors(cursors: readonly Cursor[]): Text {
    if (cursors.length === 0) {
      throw new RangeError("A text snapshot needs at least one cursor")
    }
    return new Text(this.content, normalizeCursors(cursors, this.content.length))
  }

  /** Full value equality: content and every cursor. */
  equal(other: Text): boolean {
    if (this === other) return true
    if (this.cursors.length !== other.cursors.length) return false
    for (let i = 0; i < this.cursors.length; i++) {
      const mine = this.cursors[i]
      const theirs = other.cursors[i]
      if (!mine || !theirs || !mine.equals(theirs)) return false
    }
    return Content.equal(this.content, other.content)
  }

  /**
   * Replaces every selection with pasted bytes. With several cursors and a
   * paste of exactly one line per cursor, line i goes to cursor i; otherwise
   * each cursor receives the whole paste. Cursors end up empty, after the
   * inserted bytes.
   */
  paste(bytes: Uint8Array): Text {
    const lines = this.cursors.length > 1 ? splitLines(bytes) : []
    const perCursor = lines.length === this.cursors.length
    let content = this.content
    let delta = 0
    const next: Cursor[] = []
    this.cursors.forEach((cursor, i) => {
      const insert = perCursor ? (lines[i] ?? bytes) : bytes
      const start = cursor.start().index + delta
      const end = cursor.end().index + delta
      content = content.splice(start, end, insert)
      next.push(Cursor.at(start + insert.length))
      delta += insert.length - (end - start)
    })
    return new Text(content, next)
  }

  toString(): string {
    return this.content.toString()
  }
}
