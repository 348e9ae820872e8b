import dotenv from "dotenv"
import { Context, Effect, Layer } from "effect"
import { PASTE_LIMIT_BYTES } from "../editor/editor.js"
import { loadUserConfigSync } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly clipboardCopyCommand: readonly string[] | null
  readonly clipboardPasteCommand: readonly string[] | null
  readonly pasteLimitBytes: number
}

export const parseCommandLine = (value: string | undefined): string[] | null => {
  if (!value) return null
  const parts = value.trim().split(/\s+/).filter((part) => part.length > 0)
  return parts.length > 0 ? parts : null
}

const parseLimit = (value: string | number | undefined): number | null => {
  if (value === undefined) return null
  const parsed = typeof value === "number" ? value : Number(value.trim())
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null
}

const computeConfig = (): AppConfig => {
  const userConfig = loadUserConfigSync()
  const envCopy = process.env.EDITCORE_CLIPBOARD_COPY?.trim()
  const envPaste = process.env.EDITCORE_CLIPBOARD_PASTE?.trim()
  return {
    clipboardCopyCommand: parseCommandLine(envCopy || userConfig.clipboard?.copy),
    clipboardPasteCommand: parseCommandLine(envPaste || userConfig.clipboard?.paste),
    pasteLimitBytes:
      parseLimit(process.env.EDITCORE_PASTE_LIMIT_BYTES) ??
      parseLimit(userConfig.pasteLimitBytes) ??
      PASTE_LIMIT_BYTES,
  }
}

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig")

export const AppConfigLayer = Layer.effect(AppConfigTag, Effect.sync(computeConfig))

export const loadAppConfig = (): AppConfig => computeConfig()
