import type { ExitStatus } from "../clipboard/bridge.js"

export class NoFileError extends Error {
  constructor(message = "No file is bound to this editor; set a path before saving") {
    super(message)
    this.name = "NoFileError"
  }
}

export class CopyFailedError extends Error {
  readonly status: ExitStatus

  constructor(status: ExitStatus) {
    super(
      status.kind === "exited"
        ? `Clipboard paste process exited with code ${status.code}`
        : `Clipboard paste process was terminated by ${status.signal}`,
    )
    this.name = "CopyFailedError"
    this.status = status
  }
}

export class PasteTooLargeError extends Error {
  readonly limit: number

  constructor(limit: number) {
    super(`Clipboard contents exceed the paste limit of ${limit} bytes`)
    this.name = "PasteTooLargeError"
    this.limit = limit
  }
}

export class ClipboardUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = "ClipboardUnavailableError"
  }
}
