import { Args, Command } from "@effect/cli"
import chalk from "chalk"
import { Console, Effect } from "effect"
import { Editor } from "../editor/editor.js"

export interface StatusReport {
  readonly path: string
  readonly exists: boolean
  readonly bytes: number
  readonly cursors: number
  readonly dirty: boolean
  readonly changedOnDisk: boolean
}

export const buildStatusReport = async (editor: Editor): Promise<StatusReport> => {
  const current = editor.current()
  return {
    path: editor.file?.path ?? "(unsaved)",
    exists: editor.file?.stat != null,
    bytes: current.content.length,
    cursors: current.cursors.length,
    dirty: editor.dirty(),
    changedOnDisk: await editor.changedOnDisk(),
  }
}

export const formatStatus = (report: StatusReport): string => {
  const flags = [
    report.exists ? null : chalk.yellow("[new file]"),
    report.dirty ? chalk.cyan("[modified]") : null,
    report.changedOnDisk ? chalk.red("[changed on disk]") : null,
  ].filter((flag): flag is string => flag !== null)
  const cursorLabel = report.cursors === 1 ? "cursor" : "cursors"
  const line = `${chalk.bold(report.path)}  ${report.bytes} bytes  ${report.cursors} ${cursorLabel}`
  return flags.length > 0 ? `${line}  ${flags.join(" ")}` : line
}

export const statusCommand = Command.make("status", { path: Args.text({ name: "path" }) }, ({ path }) =>
  Effect.gen(function* () {
    const report = yield* Effect.tryPromise(async () => buildStatusReport(await Editor.fromFile(path)))
    yield* Console.log(formatStatus(report))
  }),
)
