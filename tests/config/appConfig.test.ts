import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import path from "node:path"
import { loadAppConfig, parseCommandLine } from "../../src/config/appConfig.js"
import { parseUserConfig } from "../../src/config/userConfig.js"
import { PASTE_LIMIT_BYTES } from "../../src/editor/editor.js"

const ENV_KEYS = [
  "EDITCORE_USER_CONFIG",
  "EDITCORE_CLIPBOARD_COPY",
  "EDITCORE_CLIPBOARD_PASTE",
  "EDITCORE_PASTE_LIMIT_BYTES",
] as const

let tempDir: string
let configPath: string

beforeEach(() => {
  tempDir = mkdtempSync(path.join(tmpdir(), "editcore-config-"))
  configPath = path.join(tempDir, "config.json")
  for (const key of ENV_KEYS) delete process.env[key]
  process.env.EDITCORE_USER_CONFIG = configPath
})

afterEach(() => {
  for (const key of ENV_KEYS) delete process.env[key]
  rmSync(tempDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

describe("loadAppConfig", () => {
  it("uses defaults without env or user config", () => {
    expect(loadAppConfig()).toEqual({
      clipboardCopyCommand: null,
      clipboardPasteCommand: null,
      pasteLimitBytes: PASTE_LIMIT_BYTES,
    })
  })

  it("reads clipboard commands and limit from the environment", () => {
    process.env.EDITCORE_CLIPBOARD_COPY = "xclip -selection clipboard -i"
    process.env.EDITCORE_CLIPBOARD_PASTE = "  xclip   -o  "
    process.env.EDITCORE_PASTE_LIMIT_BYTES = "1024"
    expect(loadAppConfig()).toEqual({
      clipboardCopyCommand: ["xclip", "-selection", "clipboard", "-i"],
      clipboardPasteCommand: ["xclip", "-o"],
      pasteLimitBytes: 1024,
    })
  })

  it("lets the environment override the user config file", () => {
    writeFileSync(
      configPath,
      JSON.stringify({ clipboard: { copy: "file-copy", paste: "file-paste" }, pasteLimitBytes: 2048 }),
    )
    process.env.EDITCORE_CLIPBOARD_COPY = "env-copy"
    const config = loadAppConfig()
    expect(config.clipboardCopyCommand).toEqual(["env-copy"])
    expect(config.clipboardPasteCommand).toEqual(["file-paste"])
    expect(config.pasteLimitBytes).toBe(2048)
  })

  it("falls back to the default limit for invalid values", () => {
    process.env.EDITCORE_PASTE_LIMIT_BYTES = "-5"
    expect(loadAppConfig().pasteLimitBytes).toBe(PASTE_LIMIT_BYTES)
    process.env.EDITCORE_PASTE_LIMIT_BYTES = "lots"
    expect(loadAppConfig().pasteLimitBytes).toBe(PASTE_LIMIT_BYTES)
  })

  it("ignores a malformed user config file", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    writeFileSync(configPath, "{ not json")
    expect(loadAppConfig().clipboardCopyCommand).toBeNull()
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe("parseCommandLine", () => {
  it("returns null for blank input", () => {
    expect(parseCommandLine(undefined)).toBeNull()
    expect(parseCommandLine("   ")).toBeNull()
  })
})

describe("parseUserConfig", () => {
  it("keeps only well-typed fields", () => {
    expect(
      parseUserConfig({ clipboard: { copy: "pbcopy", paste: 42 }, pasteLimitBytes: "big", extra: true }),
    ).toEqual({ clipboard: { copy: "pbcopy" } })
    expect(parseUserConfig([1, 2])).toEqual({})
  })
})
