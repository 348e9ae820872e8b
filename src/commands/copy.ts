import { Args, Command, Options } from "@effect/cli"
import { Console, Effect } from "effect"
import type { ClipboardBridge } from "../clipboard/bridge.js"
import { resolveClipboardBridge } from "../clipboard/resolveBridge.js"
import { AppConfigTag } from "../config/appConfig.js"
import { Editor } from "../editor/editor.js"
import { Cursor } from "../text/cursor.js"

export interface ByteRange {
  readonly start: number
  readonly end: number
}

const OFFSET = /^\d+$/

/** Parses `start:end` (either side may be omitted) or a bare offset. */
export const parseRange = (value: string): ByteRange => {
  const [startRaw = "", endRaw, ...rest] = value.trim().split(":")
  if (rest.length > 0) {
    throw new Error(`Invalid range "${value}": expected start:end`)
  }
  const parse = (raw: string, fallback: number) => {
    if (raw === "") return fallback
    if (!OFFSET.test(raw)) throw new Error(`Invalid range "${value}": "${raw}" is not a byte offset`)
    return Number(raw)
  }
  const start = parse(startRaw, 0)
  const end = endRaw === undefined ? start : parse(endRaw, Number.MAX_SAFE_INTEGER)
  if (end < start) {
    throw new Error(`Invalid range "${value}": end is before start`)
  }
  return { start, end }
}

export interface CopyResult {
  readonly editor: Editor
  readonly selections: number
  readonly bytes: number
}

export const runCopy = async (path: string, ranges: readonly string[], bridge: ClipboardBridge): Promise<CopyResult> => {
  const loaded = await Editor.fromFile(path)
  const current = loaded.current()
  const cursors =
    ranges.length > 0
      ? ranges.map((raw) => {
          const { start, end } = parseRange(raw)
          return Cursor.range(start, end)
        })
      : [Cursor.range(0, current.content.length)]
  const selected = current.withCursors(cursors)
  const editor = loaded.addUndo(selected)
  await editor.copyClipboard(bridge)
  const bytes = selected.cursors.reduce((sum, cursor) => sum + (cursor.end().index - cursor.start().index), 0)
  return { editor: editor.markCopied(), selections: selected.cursors.length, bytes }
}

export const copyCommand = Command.make(
  "copy",
  {
    path: Args.text({ name: "path" }),
    ranges: Options.text("range").pipe(Options.repeated),
  },
  ({ path, ranges }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      const bridge = resolveClipboardBridge(config)
      const result = yield* Effect.tryPromise(() => runCopy(path, ranges, bridge))
      yield* Console.log(`Copied ${result.bytes} bytes from ${result.selections} selection(s) via ${bridge.name}`)
    }),
)
