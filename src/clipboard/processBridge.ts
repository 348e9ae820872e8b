import { spawn, type ChildProcess } from "node:child_process"
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { ClipboardUnavailableError } from "../editor/errors.js"
import { debugLog } from "../util/debugLog.js"
import type { ClipboardBridge, ClipboardCopyProcess, ClipboardPasteProcess, ExitStatus } from "./bridge.js"

export interface ClipboardCommand {
  readonly command: string
  readonly args: readonly string[]
}

export interface ClipboardCommands {
  readonly copy: ClipboardCommand
  readonly paste: ClipboardCommand
}

export const commandFromArgv = (argv: readonly string[]): ClipboardCommand | null => {
  const [command, ...args] = argv
  return command ? { command, args } : null
}

const cmd = (command: string, ...args: string[]): ClipboardCommand => ({ command, args })

/** Clipboard utilities to try on a platform, most specific first. */
export const platformCandidates = (
  platform: NodeJS.Platform = os.platform(),
  env: NodeJS.ProcessEnv = process.env,
): ClipboardCommands[] => {
  if (platform === "darwin") {
    return [{ copy: cmd("pbcopy"), paste: cmd("pbpaste") }]
  }
  if (platform === "win32") {
    return [{ copy: cmd("clip"), paste: cmd("powershell", "-NoProfile", "-Command", "Get-Clipboard") }]
  }
  const candidates: ClipboardCommands[] = []
  if (env.WAYLAND_DISPLAY) {
    candidates.push({ copy: cmd("wl-copy"), paste: cmd("wl-paste", "-n") })
  }
  candidates.push({
    copy: cmd("xclip", "-selection", "clipboard", "-i"),
    paste: cmd("xclip", "-selection", "clipboard", "-o"),
  })
  candidates.push({ copy: cmd("xsel", "--clipboard", "--input"), paste: cmd("xsel", "--clipboard", "--output") })
  return candidates
}

export const commandExists = (command: string, env: NodeJS.ProcessEnv = process.env): boolean => {
  if (command.includes(path.sep)) return fs.existsSync(command)
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir.length > 0)
  const extensions = process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""]
  return dirs.some((dir) => extensions.some((ext) => fs.existsSync(path.join(dir, command + ext))))
}

export const detectClipboardCommands = (
  candidates: readonly ClipboardCommands[] = platformCandidates(),
  exists: (command: string) => boolean = commandExists,
): ClipboardCommands | null => {
  for (const candidate of candidates) {
    if (exists(candidate.copy.command) && exists(candidate.paste.command)) {
      return candidate
    }
  }
  return null
}

const waitForExit = (child: ChildProcess, command: string): Promise<ExitStatus> => {
  const exited = new Promise<ExitStatus>((resolve, reject) => {
    child.once("error", (error: NodeJS.ErrnoException) => {
      reject(
        error.code === "ENOENT" ? new ClipboardUnavailableError(`Clipboard command not found: ${command}`, error) : error,
      )
    })
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      const status: ExitStatus = signal ? { kind: "signaled", signal } : { kind: "exited", code: code ?? 0 }
      debugLog({ clipboardProcessExit: command, status })
      resolve(status)
    })
  })
  // A spawn failure surfaces through wait(); callers that never reach it still get it logged.
  exited.catch((error: unknown) => debugLog({ clipboardProcessError: String(error), command }))
  return exited
}

const killChild = (child: ChildProcess, command: string) => {
  if (child.exitCode !== null || child.signalCode !== null) return
  if (!child.kill()) {
    debugLog({ clipboardKillFailed: command, pid: child.pid })
  }
}

export const createProcessBridge = (commands: ClipboardCommands): ClipboardBridge => ({
  name: `${commands.copy.command}/${commands.paste.command}`,

  copy(): ClipboardCopyProcess {
    const { command, args } = commands.copy
    debugLog({ clipboardSpawn: command, args })
    const child = spawn(command, [...args], { stdio: ["pipe", "ignore", "ignore"] })
    const exited = waitForExit(child, command)
    return {
      stdin: child.stdin,
      wait: () => exited,
      kill: () => killChild(child, command),
    }
  },

  paste(): ClipboardPasteProcess {
    const { command, args } = commands.paste
    debugLog({ clipboardSpawn: command, args })
    const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "ignore"] })
    const exited = waitForExit(child, command)
    return {
      stdout: child.stdout,
      wait: () => exited,
      kill: () => killChild(child, command),
    }
  },
})
