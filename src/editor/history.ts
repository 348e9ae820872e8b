/**
 * Append-only sequence of snapshots.
 *
 * Handles share one backing array and differ only in how much of it they see.
 * Appending from the newest handle pushes in place; appending from an older
 * handle copies its visible prefix first, so no handle ever sees entries
 * appended through another one.
 */
export class History<T> {
  private readonly items: T[]
  private readonly length: number

  private constructor(items: T[], length: number) {
    this.items = items
    this.length = length
  }

  static of<T>(first: T): History<T> {
    return new History([first], 1)
  }

  append(item: T): History<T> {
    if (this.length === this.items.length) {
      this.items.push(item)
      return new History(this.items, this.length + 1)
    }
    const items = this.items.slice(0, this.length)
    items.push(item)
    return new History(items, items.length)
  }

  at(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`History index ${index} out of range (len ${this.length})`)
    }
    const item = this.items[index]
    if (item === undefined) {
      throw new RangeError(`History index ${index} is empty`)
    }
    return item
  }

  len(): number {
    return this.length
  }
}
