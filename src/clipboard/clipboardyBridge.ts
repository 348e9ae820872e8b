import { PassThrough } from "node:stream"
import clipboardy from "clipboardy"
import { debugLog } from "../util/debugLog.js"
import type { ClipboardBridge, ClipboardCopyProcess, ClipboardPasteProcess, ExitStatus } from "./bridge.js"

const OK: ExitStatus = { kind: "exited", code: 0 }
const FAILED: ExitStatus = { kind: "exited", code: 1 }
const KILLED: ExitStatus = { kind: "signaled", signal: "SIGTERM" }

/**
 * Fallback for hosts without a known clipboard command. clipboardy works on
 * whole strings, so each "process" here is a stream pair around one call.
 */
export const createClipboardyBridge = (): ClipboardBridge => ({
  name: "clipboardy",

  copy(): ClipboardCopyProcess {
    const stdin = new PassThrough()
    const chunks: Buffer[] = []
    let settle: (status: ExitStatus) => void = () => {}
    const exited = new Promise<ExitStatus>((resolve) => {
      settle = resolve
    })
    stdin.on("data", (chunk: Buffer) => chunks.push(chunk))
    stdin.once("end", () => {
      clipboardy.write(Buffer.concat(chunks).toString("utf8")).then(
        () => settle(OK),
        (error: unknown) => {
          debugLog({ clipboardyWriteError: String(error) })
          settle(FAILED)
        },
      )
    })
    return {
      stdin,
      wait: () => exited,
      kill: () => {
        stdin.destroy()
        settle(KILLED)
      },
    }
  },

  paste(): ClipboardPasteProcess {
    const stdout = new PassThrough()
    let killed = false
    const exited = clipboardy.read().then(
      (text) => {
        if (killed) return KILLED
        stdout.end(Buffer.from(text, "utf8"))
        return OK
      },
      (error: unknown) => {
        debugLog({ clipboardyReadError: String(error) })
        stdout.end()
        return killed ? KILLED : FAILED
      },
    )
    return {
      stdout,
      wait: () => exited,
      kill: () => {
        killed = true
        stdout.destroy()
      },
    }
  },
})
