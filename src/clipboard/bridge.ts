import type { Readable, Writable } from "node:stream"

export type ExitStatus =
  | { readonly kind: "exited"; readonly code: number }
  | { readonly kind: "signaled"; readonly signal: NodeJS.Signals }

export interface ClipboardProcess {
  /** Resolves once the process has exited and its streams are closed. */
  wait(): Promise<ExitStatus>
  /** Best-effort termination; never throws. */
  kill(): void
}

export interface ClipboardCopyProcess extends ClipboardProcess {
  readonly stdin: Writable
}

export interface ClipboardPasteProcess extends ClipboardProcess {
  readonly stdout: Readable
}

/**
 * Narrow contract over whatever actually owns the system clipboard: one
 * process that takes bytes on its input, one that produces them on its output.
 */
export interface ClipboardBridge {
  readonly name: string
  copy(): ClipboardCopyProcess
  paste(): ClipboardPasteProcess
}

export const isSuccess = (status: ExitStatus): boolean => status.kind === "exited" && status.code === 0

export const formatExitStatus = (status: ExitStatus): string =>
  status.kind === "exited" ? `exit ${status.code}` : `signal ${status.signal}`
