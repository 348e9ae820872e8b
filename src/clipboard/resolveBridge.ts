import type { AppConfig } from "../config/appConfig.js"
import { debugLog } from "../util/debugLog.js"
import type { ClipboardBridge } from "./bridge.js"
import { createClipboardyBridge } from "./clipboardyBridge.js"
import { commandFromArgv, createProcessBridge, detectClipboardCommands, type ClipboardCommands } from "./processBridge.js"

type ClipboardConfig = Pick<AppConfig, "clipboardCopyCommand" | "clipboardPasteCommand">

/**
 * Configured commands win, each side independently; anything left unset is
 * filled from the platform probe. With neither, clipboardy takes over.
 */
export const resolveClipboardBridge = (
  config: ClipboardConfig,
  detect: () => ClipboardCommands | null = detectClipboardCommands,
): ClipboardBridge => {
  const configuredCopy = config.clipboardCopyCommand ? commandFromArgv(config.clipboardCopyCommand) : null
  const configuredPaste = config.clipboardPasteCommand ? commandFromArgv(config.clipboardPasteCommand) : null
  const detected = configuredCopy && configuredPaste ? null : detect()
  const copy = configuredCopy ?? detected?.copy
  const paste = configuredPaste ?? detected?.paste
  if (copy && paste) {
    const bridge = createProcessBridge({ copy, paste })
    debugLog({ clipboardBridge: bridge.name })
    return bridge
  }
  debugLog({ clipboardBridge: "clipboardy", reason: "no clipboard command found" })
  return createClipboardyBridge()
}
