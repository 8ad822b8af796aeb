import { NodeContext } from "@effect/platform-node"
import * as FileSystem from "@effect/platform/FileSystem"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeStats } from "../../src/core/stats.js"
import { reconcileResumable } from "../../src/shell/reconcile/resumable.js"
import { makeRuleStateStore } from "../../src/shell/state/rule-state-store.js"
import { withTempDir } from "../support/fs-helpers.js"
import { DESKTOP_ROOT, DEVICE_ROOT, filesBelow, makeWorld, pullParams } from "../support/memory-storage.js"

const backupWorld = () =>
  makeWorld({
    [`${DEVICE_ROOT}/a.jpg`]: 10,
    [`${DEVICE_ROOT}/b.jpg`]: 20,
    [`${DEVICE_ROOT}/sub/c.jpg`]: 30,
    [`${DESKTOP_ROOT}/b.jpg`]: 99
  })

describe("reconcileResumable", () => {
  it.scoped("records progress and resumes where it stopped", () =>
    Effect.gen(function*(_) {
      const dir = yield* _(withTempDir)
      const store = yield* _(makeRuleStateStore(dir))
      const world = backupWorld()
      world.failCopy.add(`${DEVICE_ROOT}/sub/c.jpg`)

      const first = yield* _(reconcileResumable(pullParams(world), store, "camera"))
      expect(first).toEqual(makeStats({ copied: 1, skipped: 1, errors: 1, bytes: 10 }))
      const saved = yield* _(store.load("camera"))
      expect(saved.copied).toEqual(new Set(["a.jpg"]))
      expect(saved.failed).toEqual([{ path: "sub/c.jpg", error: "Cannot copy file" }])
      expect(saved.status).toBe("in_progress")
      expect(saved.totalFiles).toBe(3)

      world.failCopy.clear()
      const second = yield* _(reconcileResumable(pullParams(world), store, "camera"))
      expect(second).toEqual(makeStats({ copied: 1, skipped: 2, bytes: 30 }))
      expect(yield* _(store.entries)).toEqual([])
      expect(filesBelow(world, DESKTOP_ROOT)).toEqual(["a.jpg:10", "b.jpg:99", "sub/c.jpg:30"])
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("previews without writing progress", () =>
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem.FileSystem)
      const dir = yield* _(withTempDir)
      const store = yield* _(makeRuleStateStore(dir))
      const world = backupWorld()

      const stats = yield* _(reconcileResumable(pullParams(world, { dryRun: true }), store, "camera"))
      expect(stats).toEqual(makeStats({ copied: 2, skipped: 1, bytes: 40 }))
      expect(world.mutations).toEqual([])
      expect(yield* _(fs.exists(store.location))).toBe(false)
    }).pipe(Effect.provide(NodeContext.layer)))
})
