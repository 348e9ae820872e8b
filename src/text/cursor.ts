export interface Position {
  readonly index: number
}

export const position = (index: number): Position => ({ index })

/**
 * A selection over content bytes. `anchor` stays put while `head` moves; the
 * covered range is always `[start, end)` regardless of direction.
 */
export class Cursor {
  readonly anchor: Position
  readonly head: Position

  constructor(anchor: Position, head: Position = anchor) {
    this.anchor = anchor
    this.head = head
  }

  static at(index: number): Cursor {
    return new Cursor(position(index))
  }

  static range(start: number, end: number): Cursor {
    return new Cursor(position(start), position(end))
  }

  start(): Position {
    return this.anchor.index <= this.head.index ? this.anchor : this.head
  }

  end(): Position {
    return this.anchor.index <= this.head.index ? this.head : this.anchor
  }

  isEmpty(): boolean {
    return this.anchor.index === this.head.index
  }

  equals(other: Cursor): boolean {
    return this.anchor.index === other.anchor.index && this.head.index === other.head.index
  }

  clampTo(length: number): Cursor {
    const clamp = (value: number) => Math.max(0, Math.min(value, length))
    return new Cursor(position(clamp(this.anchor.index)), position(clamp(this.head.index)))
  }
}
