#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { stagerCommand } from "./commands/stage/command.js"

const cli = Command.run(stagerCommand, { name: "git-stager", version: "0.1.0" })

// Failures are already printed by the command; keep runMain from dumping the cause.
cli(process.argv).pipe(Effect.provide(NodeContext.layer), (program) =>
  NodeRuntime.runMain(program, { disableErrorReporting: true }),
)
