import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import type { ClipboardBridge } from "../clipboard/bridge.js"
import { resolveClipboardBridge } from "../clipboard/resolveBridge.js"
import { AppConfigTag } from "../config/appConfig.js"
import { Editor } from "../editor/editor.js"
import { Cursor } from "../text/cursor.js"

export interface PasteRequest {
  readonly path: string
  /** Byte offset to paste at; end of file when null. */
  readonly at: number | null
  readonly limitBytes: number
}

export interface PasteResult {
  readonly editor: Editor
  /** Growth of the document; negative when the paste replaced a longer selection. */
  readonly delta: number
}

export const runPaste = async (request: PasteRequest, bridge: ClipboardBridge): Promise<PasteResult> => {
  const loaded = await Editor.fromFile(request.path)
  const current = loaded.current()
  const at = request.at ?? current.content.length
  const positioned = loaded.addUndo(current.withCursors([Cursor.at(at)]))
  const pasted = await positioned.pasteClipboard(bridge, { limitBytes: request.limitBytes })
  const editor = await pasted.save()
  return { editor, delta: editor.current().content.length - current.content.length }
}

export const pasteCommand = Command.make(
  "paste",
  {
    path: Args.text({ name: "path" }),
    at: Options.integer("at").pipe(Options.optional),
  },
  ({ path, at }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      const bridge = resolveClipboardBridge(config)
      const result = yield* Effect.tryPromise(() =>
        runPaste({ path, at: Option.getOrNull(at), limitBytes: config.pasteLimitBytes }, bridge),
      )
      yield* Console.log(`Pasted ${result.delta} bytes into ${path}`)
    }),
)
