#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { copyCommand } from "./commands/copy.js"
import { pasteCommand } from "./commands/paste.js"
import { statusCommand } from "./commands/status.js"
import { AppConfigLayer } from "./config/appConfig.js"

const root = Command.make("editcore", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([statusCommand, copyCommand, pasteCommand]),
)

const cli = Command.run(root, { name: "editcore", version: "0.1.0" })

cli(process.argv).pipe(Effect.provide(AppConfigLayer), Effect.provide(NodeContext.layer), NodeRuntime.runMain)
