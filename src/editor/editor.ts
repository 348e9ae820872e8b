import { createWriteStream, promises as fs, type Stats } from "node:fs"
import type { FileHandle } from "node:fs/promises"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { formatExitStatus, isSuccess, type ClipboardBridge } from "../clipboard/bridge.js"
import { Content } from "../text/content.js"
import { Text } from "../text/text.js"
import { debugLog } from "../util/debugLog.js"
import { ClipboardUnavailableError, CopyFailedError, NoFileError, PasteTooLargeError } from "./errors.js"
import { History } from "./history.js"

export const PASTE_LIMIT_BYTES = 512 * 1024 * 1024

const SEPARATOR = new Uint8Array([0x0a])

export interface FileBinding {
  readonly path: string
  /** Metadata captured when the file was loaded or last saved; null when it did not exist. */
  readonly stat: Stats | null
}

export interface PasteOptions {
  readonly limitBytes?: number
}

interface EditorState {
  readonly history: History<Text>
  readonly historyPos: number
  readonly onDiskPos: number
  readonly copyPos: number
  /** Where the last undo's backward walk stopped; null once anything else is recorded. */
  readonly undoAnchor: number | null
  readonly file: FileBinding | null
}

const isNotFound = (error: unknown): boolean => error instanceof Error && "code" in error && error.code === "ENOENT"

const readExactly = async (handle: FileHandle, size: number): Promise<Buffer> => {
  const buffer = Buffer.alloc(size)
  let offset = 0
  while (offset < size) {
    const { bytesRead } = await handle.read(buffer, offset, size - offset, offset)
    if (bytesRead === 0) break
    offset += bytesRead
  }
  return offset === size ? buffer : buffer.subarray(0, offset)
}

const readAllBounded = async (stream: Readable, limit: number): Promise<Buffer> => {
  const chunks: Buffer[] = []
  let total = 0
  for await (const chunk of stream) {
    const data: unknown = chunk
    const bytes = Buffer.isBuffer(data) ? data : data instanceof Uint8Array ? Buffer.from(data) : Buffer.from(String(data))
    total += bytes.length
    if (total > limit) {
      throw new PasteTooLargeError(limit)
    }
    chunks.push(bytes)
  }
  return Buffer.concat(chunks, total)
}

function* selectionChunks(text: Text): Generator<Uint8Array> {
  for (const [i, cursor] of text.cursors.entries()) {
    if (i > 0) yield SEPARATOR
    yield* text.content.chunks(cursor.start().index, cursor.end().index)
  }
}

/**
 * Editor: edit history of one document plus its baselines.
 *
 * Values are immutable; every operation returns a new Editor. History only
 * ever grows, so `historyPos`, `onDiskPos` and `copyPos` are plain indices
 * that stay valid for the lifetime of any Editor derived from this one.
 */
export class Editor {
  readonly history: History<Text>
  readonly historyPos: number
  readonly onDiskPos: number
  readonly copyPos: number
  readonly file: FileBinding | null
  private readonly undoAnchor: number | null

  private constructor(state: EditorState) {
    this.history = state.history
    this.historyPos = state.historyPos
    this.onDiskPos = state.onDiskPos
    this.copyPos = state.copyPos
    this.undoAnchor = state.undoAnchor
    this.file = state.file
  }

  static fromText(text: Text): Editor {
    return new Editor({
      history: History.of(text),
      historyPos: 0,
      onDiskPos: 0,
      copyPos: 0,
      undoAnchor: null,
      file: null,
    })
  }

  static fromString(input: string | Uint8Array): Editor {
    return Editor.fromText(Text.fromString(input))
  }

  /**
   * Loads `filePath`. A missing file is a new, empty document bound to that
   * path with no metadata; any other I/O failure propagates.
   */
  static async fromFile(filePath: string): Promise<Editor> {
    let handle: FileHandle
    try {
      handle = await fs.open(filePath, "r")
    } catch (error) {
      if (!isNotFound(error)) throw error
      debugLog({ editorLoad: filePath, exists: false })
      return Editor.fromString("").with({ file: { path: filePath, stat: null } })
    }
    try {
      const stat = await handle.stat()
      const text = stat.size === 0 ? Text.fromString("") : Text.fromContent(Content.adopt(await readExactly(handle, stat.size)))
      debugLog({ editorLoad: filePath, exists: true, size: stat.size })
      return Editor.fromText(text).with({ file: { path: filePath, stat } })
    } finally {
      await handle.close()
    }
  }

  private with(patch: Partial<EditorState>): Editor {
    return new Editor({
      history: this.history,
      historyPos: this.historyPos,
      onDiskPos: this.onDiskPos,
      copyPos: this.copyPos,
      undoAnchor: this.undoAnchor,
      file: this.file,
      ...patch,
    })
  }

  current(): Text {
    return this.history.at(this.historyPos)
  }

  onDisk(): Text {
    return this.history.at(this.onDiskPos)
  }

  copied(): Text {
    return this.history.at(this.copyPos)
  }

  /**
   * Records `text` as the newest state. Identical snapshots (content and
   * cursors) are dropped. The entry always lands at the end of history and
   * `historyPos` follows it; there is no branching from the middle.
   */
  addUndo(text: Text): Editor {
    if (text.equal(this.current())) return this
    const history = this.history.append(text)
    return this.with({ history, historyPos: history.len() - 1, undoAnchor: null })
  }

  /**
   * Appends the nearest earlier state whose content differs from the current
   * one. Consecutive undos continue walking from where the previous one
   * stopped. At the start of history the first entry is appended again.
   */
  undo(): Editor {
    const curr = this.current()
    let pos = this.undoAnchor ?? this.historyPos
    while (pos !== 0) {
      pos -= 1
      if (!Content.equal(curr.content, this.history.at(pos).content)) break
    }
    const history = this.history.append(this.history.at(pos))
    return this.with({ history, historyPos: history.len() - 1, undoAnchor: pos })
  }

  dirty(): boolean {
    return !Content.equal(this.onDisk().content, this.current().content)
  }

  markCopied(): Editor {
    return this.with({ copyPos: this.historyPos })
  }

  /** Binds a save target. The next save writes there even if nothing changed. */
  withFile(filePath: string): Editor {
    return this.with({ file: { path: filePath, stat: null } })
  }

  /**
   * Writes the current content to the bound file, replacing it entirely.
   * Clean editors are returned as-is, unless the file has never existed.
   */
  async save(): Promise<Editor> {
    const file = this.file
    const neverWritten = file !== null && file.stat === null
    if (!this.dirty() && !neverWritten) return this
    if (!file) throw new NoFileError()

    const content = this.current().content
    await pipeline(Readable.from(content.chunks()), createWriteStream(file.path, { flags: "w" }))
    const stat = await fs.stat(file.path)
    debugLog({ editorSave: file.path, size: content.length })
    return this.with({ onDiskPos: this.historyPos, file: { path: file.path, stat } })
  }

  /** Whether the bound file's size or mtime differ from what was captured at load/save. */
  async changedOnDisk(): Promise<boolean> {
    if (!this.file) return false
    let latest: Stats | null
    try {
      latest = await fs.stat(this.file.path)
    } catch (error) {
      if (!isNotFound(error)) throw error
      latest = null
    }
    const captured = this.file.stat
    if (!captured || !latest) return captured !== latest
    return captured.size !== latest.size || captured.mtimeMs !== latest.mtimeMs
  }

  /**
   * Streams every selection of the current snapshot to the clipboard,
   * newline-separated. The copy process's exit status is logged, not checked.
   */
  async copyClipboard(bridge: ClipboardBridge): Promise<void> {
    const text = this.current()
    const proc = bridge.copy()
    try {
      await pipeline(Readable.from(selectionChunks(text)), proc.stdin)
    } catch (error) {
      proc.kill()
      const exit = await proc.wait().catch((exitError: unknown) => exitError)
      throw exit instanceof ClipboardUnavailableError ? exit : error
    }
    const status = await proc.wait()
    debugLog({ clipboardCopy: bridge.name, cursors: text.cursors.length, status: formatExitStatus(status) })
  }

  /**
   * Pastes the clipboard at every cursor and records the result. Fails
   * without changing anything when the paste process fails or its output
   * exceeds `limitBytes`.
   */
  async pasteClipboard(bridge: ClipboardBridge, options: PasteOptions = {}): Promise<Editor> {
    const limit = options.limitBytes ?? PASTE_LIMIT_BYTES
    const proc = bridge.paste()
    let bytes: Buffer
    try {
      bytes = await readAllBounded(proc.stdout, limit)
    } catch (error) {
      proc.kill()
      throw error
    }
    const status = await proc.wait()
    if (!isSuccess(status)) {
      throw new CopyFailedError(status)
    }
    debugLog({ clipboardPaste: bridge.name, bytes: bytes.length })
    return this.addUndo(this.current().paste(bytes))
  }
}
