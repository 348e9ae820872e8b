export { Editor, PASTE_LIMIT_BYTES, type FileBinding, type PasteOptions } from "./editor.js"
export { ClipboardUnavailableError, CopyFailedError, NoFileError, PasteTooLargeError } from "./errors.js"
export { History } from "./history.js"
