#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, pipe } from "effect"

import { DiskSpaceLive } from "../shell/services/disk-space.js"
import { DeviceStorageLive } from "../shell/services/gio-storage.js"
import { DesktopStorageLive } from "../shell/services/local-storage.js"
import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { program } from "./program.js"

const main = pipe(
  program,
  Effect.provide(
    Layer.provideMerge(
      Layer.mergeAll(RuntimeEnvLive, DesktopStorageLive, DeviceStorageLive(), DiskSpaceLive),
      NodeContext.layer
    )
  )
)

NodeRuntime.runMain(main)
