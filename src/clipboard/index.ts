export {
  formatExitStatus,
  isSuccess,
  type ClipboardBridge,
  type ClipboardCopyProcess,
  type ClipboardPasteProcess,
  type ClipboardProcess,
  type ExitStatus,
} from "./bridge.js"
export { createClipboardyBridge } from "./clipboardyBridge.js"
export {
  commandExists,
  commandFromArgv,
  createProcessBridge,
  detectClipboardCommands,
  platformCandidates,
  type ClipboardCommand,
  type ClipboardCommands,
} from "./processBridge.js"
export { resolveClipboardBridge } from "./resolveBridge.js"
