import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Either, Layer, Option } from "effect"

import type { Rule } from "../../src/core/rule.js"
import { makeStats } from "../../src/core/stats.js"
import { previewAndExecute } from "../../src/shell/runner.js"
import { DiskSpace } from "../../src/shell/services/disk-space.js"
import { DesktopStorage, DeviceStorage } from "../../src/shell/services/storage.js"
import { RuleStateStore, RuleStateStoreLive } from "../../src/shell/state/rule-state-store.js"
import { withTempDir } from "../support/fs-helpers.js"
import { DESKTOP_ROOT, DEVICE_ROOT, filesBelow, makeWorld, type MemoryWorld, memoryStorage } from "../support/memory-storage.js"
import { makeRuntimeEnvLayer } from "../support/runtime-env.js"
import { settled } from "../support/settled.js"

const camera: Rule = { id: "camera", mode: "copy", devicePath: "DCIM", desktopPath: "~/Pictures", manualOnly: false }
const music: Rule = { id: "music", mode: "sync", devicePath: "Music", desktopPath: "~/Music", manualOnly: false }
const backup: Rule = {
  id: "backup",
  mode: "resumable-backup",
  devicePath: "~/is/DCIM",
  desktopPath: "$BACKUP_ROOT/phone",
  manualOnly: false
}

const phoneWorld = () => makeWorld({ [`${DEVICE_ROOT}/a.jpg`]: 10, [`${DEVICE_ROOT}/b.jpg`]: 20 }, [DESKTOP_ROOT])

const runWith = (world: MemoryWorld, free: Option.Option<number>, rules: ReadonlyArray<Rule>, execute: boolean) =>
  Effect.gen(function*(_) {
    const stateDir = yield* _(withTempDir)
    const services = Layer.mergeAll(
      Layer.succeed(DeviceStorage, memoryStorage(world, "device")),
      Layer.succeed(DesktopStorage, memoryStorage(world, "desktop")),
      Layer.succeed(DiskSpace, { freeBytes: () => Effect.succeed(free) }),
      makeRuntimeEnvLayer({ cwd: "/work", homedir: "/home/tester", env: { BACKUP_ROOT: "/srv/backup" } }),
      RuleStateStoreLive(stateDir)
    )
    return yield* _(
      Effect.gen(function*(_) {
        const outcomes = yield* _(previewAndExecute({ rules, deviceRoot: "mtp://phone", execute }))
        const store = yield* _(RuleStateStore)
        const saved = yield* _(store.entries)
        return { outcomes, saved }
      }).pipe(Effect.provide(services))
    )
  })

describe("previewAndExecute", () => {
  it.scoped("stops after the preview unless told to execute", () =>
    Effect.gen(function*(_) {
      const world = phoneWorld()
      const { outcomes } = yield* _(runWith(world, Option.some(1_000_000), [camera], false))
      expect(outcomes.map((outcome) => settled(outcome.result))).toEqual([{ right: makeStats({ copied: 2, bytes: 30 }) }])
      expect(world.mutations).toEqual([])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("executes every rule after a safe preview", () =>
    Effect.gen(function*(_) {
      const world = phoneWorld()
      const { outcomes, saved } = yield* _(runWith(world, Option.some(1_000_000), [camera, backup], true))
      expect(outcomes.map((outcome) => [outcome.rule.id, settled(outcome.result)])).toEqual([
        ["camera", { right: makeStats({ copied: 2, bytes: 30 }) }],
        ["backup", { right: makeStats({ copied: 2, bytes: 30 }) }]
      ])
      expect(filesBelow(world, DESKTOP_ROOT)).toEqual(["a.jpg:10", "b.jpg:20"])
      expect(filesBelow(world, "/srv/backup/phone")).toEqual(["a.jpg:10", "b.jpg:20"])
      expect(saved).toEqual([])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("fails a rule that would not fit and still runs the next one", () =>
    Effect.gen(function*(_) {
      const world = phoneWorld()
      const { outcomes } = yield* _(runWith(world, Option.some(20), [camera, music], true))
      expect(outcomes.map((outcome) => settled(outcome.result))).toEqual([
        { left: { _tag: "PreflightError", required: 30, available: 20, deficit: 11 } },
        { right: makeStats({ errors: 1 }) }
      ])
      expect(world.mutations).toEqual([])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("does not execute a rule whose preview failed", () =>
    Effect.gen(function*(_) {
      const taken: Record<string, number> = { [`${DESKTOP_ROOT}/a.jpg`]: 1 }
      for (let counter = 1; counter <= 1000; counter += 1) {
        taken[`${DESKTOP_ROOT}/a (${counter}).jpg`] = 1
      }
      const world = makeWorld({ [`${DEVICE_ROOT}/0.jpg`]: 5, [`${DEVICE_ROOT}/a.jpg`]: 10, ...taken })
      const { outcomes } = yield* _(runWith(world, Option.some(1_000_000), [camera, backup], true))
      expect(outcomes.map((outcome) => [outcome.rule.id, settled(outcome.result)])).toEqual([
        ["camera", { left: { _tag: "ConflictExhausted", name: "a.jpg", probes: 1000 } }],
        ["backup", { right: makeStats({ copied: 2, bytes: 15 }) }]
      ])
      expect(world.entries.has(`${DESKTOP_ROOT}/0.jpg`)).toBe(false)
      expect(world.mutations.filter((mutation) => mutation.endsWith(`${DESKTOP_ROOT}/0.jpg`))).toEqual([])
      expect(filesBelow(world, "/srv/backup/phone")).toEqual(["0.jpg:5", "a.jpg:10"])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("runs without a space check when free space is unknown", () =>
    Effect.gen(function*(_) {
      const world = phoneWorld()
      const { outcomes } = yield* _(runWith(world, Option.none(), [camera], true))
      expect(outcomes.map((outcome) => Either.isRight(outcome.result))).toEqual([true])
      expect(filesBelow(world, DESKTOP_ROOT)).toEqual(["a.jpg:10", "b.jpg:20"])
    }).pipe(Effect.provide(NodeContext.layer)))
})
