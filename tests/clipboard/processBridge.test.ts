import { EventEmitter } from "node:events"
import { PassThrough } from "node:stream"
import { beforeEach, describe, expect, it, vi } from "vitest"
import {
  commandFromArgv,
  createProcessBridge,
  detectClipboardCommands,
  platformCandidates,
  type ClipboardCommands,
} from "../../src/clipboard/processBridge.js"
import { resolveClipboardBridge } from "../../src/clipboard/resolveBridge.js"
import { ClipboardUnavailableError } from "../../src/editor/errors.js"

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock("node:child_process", () => ({
  spawn: spawnMock,
}))

vi.mock("clipboardy", () => ({
  default: { read: vi.fn(), write: vi.fn() },
}))

class FakeChild extends EventEmitter {
  readonly stdin = new PassThrough()
  readonly stdout = new PassThrough()
  readonly pid = 4242
  exitCode: number | null = null
  signalCode: NodeJS.Signals | null = null
  readonly kill = vi.fn(() => true)
}

const xclip: ClipboardCommands = {
  copy: { command: "xclip", args: ["-selection", "clipboard", "-i"] },
  paste: { command: "xclip", args: ["-selection", "clipboard", "-o"] },
}

let child: FakeChild

beforeEach(() => {
  child = new FakeChild()
  spawnMock.mockReset()
  spawnMock.mockImplementation(() => child)
})

describe("createProcessBridge", () => {
  it("spawns the copy command with only stdin piped", async () => {
    const proc = createProcessBridge(xclip).copy()
    expect(spawnMock).toHaveBeenCalledWith("xclip", ["-selection", "clipboard", "-i"], {
      stdio: ["pipe", "ignore", "ignore"],
    })
    expect(proc.stdin).toBe(child.stdin)
    child.emit("close", 0, null)
    await expect(proc.wait()).resolves.toEqual({ kind: "exited", code: 0 })
  })

  it("spawns the paste command with only stdout piped", async () => {
    const proc = createProcessBridge(xclip).paste()
    expect(spawnMock).toHaveBeenCalledWith("xclip", ["-selection", "clipboard", "-o"], {
      stdio: ["ignore", "pipe", "ignore"],
    })
    expect(proc.stdout).toBe(child.stdout)
    child.emit("close", 1, null)
    await expect(proc.wait()).resolves.toEqual({ kind: "exited", code: 1 })
  })

  it("reports termination by signal", async () => {
    const proc = createProcessBridge(xclip).paste()
    child.emit("close", null, "SIGTERM")
    await expect(proc.wait()).resolves.toEqual({ kind: "signaled", signal: "SIGTERM" })
  })

  it("maps a missing executable to ClipboardUnavailableError", async () => {
    const proc = createProcessBridge(xclip).copy()
    const error = Object.assign(new Error("spawn xclip ENOENT"), { code: "ENOENT" })
    child.emit("error", error)
    await expect(proc.wait()).rejects.toBeInstanceOf(ClipboardUnavailableError)
    await expect(proc.wait()).rejects.toThrow("Clipboard command not found: xclip")
  })

  it("passes other spawn errors through", async () => {
    const proc = createProcessBridge(xclip).copy()
    child.emit("error", Object.assign(new Error("spawn xclip EACCES"), { code: "EACCES" }))
    await expect(proc.wait()).rejects.toThrow("spawn xclip EACCES")
  })

  it("kills only a running process", () => {
    const proc = createProcessBridge(xclip).copy()
    proc.kill()
    expect(child.kill).toHaveBeenCalledTimes(1)
    child.exitCode = 0
    proc.kill()
    expect(child.kill).toHaveBeenCalledTimes(1)
  })
})

describe("platformCandidates", () => {
  it("uses pbcopy and pbpaste on macOS", () => {
    expect(platformCandidates("darwin", {}).map((c) => [c.copy.command, c.paste.command])).toEqual([
      ["pbcopy", "pbpaste"],
    ])
  })

  it("prefers wl-clipboard under Wayland", () => {
    const candidates = platformCandidates("linux", { WAYLAND_DISPLAY: "wayland-0" })
    expect(candidates.map((c) => c.copy.command)).toEqual(["wl-copy", "xclip", "xsel"])
    expect(candidates[0]?.paste.args).toEqual(["-n"])
  })

  it("falls back to X11 tools elsewhere on Linux", () => {
    expect(platformCandidates("linux", {}).map((c) => c.paste.command)).toEqual(["xclip", "xsel"])
  })

  it("uses clip and PowerShell on Windows", () => {
    const [candidate] = platformCandidates("win32", {})
    expect(candidate?.copy).toEqual({ command: "clip", args: [] })
    expect(candidate?.paste).toEqual({ command: "powershell", args: ["-NoProfile", "-Command", "Get-Clipboard"] })
  })
})

describe("detectClipboardCommands", () => {
  it("picks the first candidate whose commands both exist", () => {
    const candidates = platformCandidates("linux", {})
    const detected = detectClipboardCommands(candidates, (command) => command === "xsel")
    expect(detected?.copy).toEqual({ command: "xsel", args: ["--clipboard", "--input"] })
  })

  it("returns null when nothing is installed", () => {
    expect(detectClipboardCommands(platformCandidates("linux", {}), () => false)).toBeNull()
  })
})

describe("commandFromArgv", () => {
  it("splits the executable from its arguments", () => {
    expect(commandFromArgv(["xclip", "-o"])).toEqual({ command: "xclip", args: ["-o"] })
    expect(commandFromArgv([])).toBeNull()
  })
})

describe("resolveClipboardBridge", () => {
  it("uses configured commands without probing", () => {
    const detect = vi.fn(() => xclip)
    const bridge = resolveClipboardBridge(
      { clipboardCopyCommand: ["my-copy"], clipboardPasteCommand: ["my-paste", "--raw"] },
      detect,
    )
    expect(bridge.name).toBe("my-copy/my-paste")
    expect(detect).not.toHaveBeenCalled()
  })

  it("fills an unset side from the platform probe", () => {
    const bridge = resolveClipboardBridge({ clipboardCopyCommand: ["my-copy"], clipboardPasteCommand: null }, () => xclip)
    expect(bridge.name).toBe("my-copy/xclip")
  })

  it("falls back to clipboardy when nothing is available", () => {
    const bridge = resolveClipboardBridge({ clipboardCopyCommand: null, clipboardPasteCommand: null }, () => null)
    expect(bridge.name).toBe("clipboardy")
  })
})
