import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"

export interface UserConfigFile {
  readonly clipboard?: {
    readonly copy?: string
    readonly paste?: string
  }
  readonly pasteLimitBytes?: number
}

const resolveConfigPath = (): string => {
  const explicit = process.env.EDITCORE_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".editcore", "config.json")
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const parseUserConfig = (parsed: unknown): UserConfigFile => {
  if (!isRecord(parsed)) return {}
  const clipboardRaw = isRecord(parsed.clipboard) ? parsed.clipboard : undefined
  const clipboard = clipboardRaw
    ? {
        ...(typeof clipboardRaw.copy === "string" ? { copy: clipboardRaw.copy } : {}),
        ...(typeof clipboardRaw.paste === "string" ? { paste: clipboardRaw.paste } : {}),
      }
    : undefined
  const pasteLimitBytes = typeof parsed.pasteLimitBytes === "number" ? parsed.pasteLimitBytes : undefined
  return {
    ...(clipboard ? { clipboard } : {}),
    ...(pasteLimitBytes !== undefined ? { pasteLimitBytes } : {}),
  }
}

export const loadUserConfigSync = (): UserConfigFile => {
  const configPath = resolveConfigPath()
  if (!fs.existsSync(configPath)) return {}
  try {
    return parseUserConfig(JSON.parse(fs.readFileSync(configPath, "utf8")))
  } catch (error) {
    console.warn(`Ignoring unreadable config at ${configPath}: ${String(error)}`)
    return {}
  }
}
