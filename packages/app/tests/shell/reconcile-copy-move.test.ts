import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import fc from "fast-check"

import { makeStats } from "../../src/core/stats.js"
import { reconcileCopy } from "../../src/shell/reconcile/copy.js"
import { reconcileMove } from "../../src/shell/reconcile/move.js"
import {
  DESKTOP_ROOT,
  DEVICE_ROOT,
  directoriesBelow,
  filesBelow,
  makeWorld,
  pullParams
} from "../support/memory-storage.js"

const cameraWorld = () =>
  makeWorld({
    [`${DEVICE_ROOT}/a.jpg`]: 10,
    [`${DEVICE_ROOT}/sub/b.jpg`]: 20,
    [`${DEVICE_ROOT}/sub/deeper/c.jpg`]: 0,
    [`${DESKTOP_ROOT}/a.jpg`]: 5
  })

describe("reconcileCopy", () => {
  it.effect("copies the tree and renames clashing names", () =>
    Effect.gen(function*(_) {
      const world = cameraWorld()
      const stats = yield* _(reconcileCopy(pullParams(world)))
      expect(stats).toEqual(makeStats({ copied: 3, renamed: 1, folders: 2, bytes: 30 }))
      expect(filesBelow(world, DESKTOP_ROOT)).toEqual([
        "a (1).jpg:10",
        "a.jpg:5",
        "sub/b.jpg:20",
        "sub/deeper/c.jpg:0"
      ])
      expect(filesBelow(world, DEVICE_ROOT)).toEqual(["a.jpg:10", "sub/b.jpg:20", "sub/deeper/c.jpg:0"])
      expect(world.mutations.some((mutation) => mutation.startsWith("remove"))).toBe(false)
    }))

  it.effect("previews the same counters without touching either tree", () =>
    Effect.gen(function*(_) {
      const world = cameraWorld()
      const stats = yield* _(reconcileCopy(pullParams(world, { dryRun: true })))
      expect(stats).toEqual(makeStats({ copied: 3, renamed: 1, folders: 2, bytes: 30 }))
      expect(world.mutations).toEqual([])
      expect(filesBelow(world, DESKTOP_ROOT)).toEqual(["a.jpg:5"])
    }))

  it.effect("counts a copy that lands empty as an error", () =>
    Effect.gen(function*(_) {
      const world = cameraWorld()
      world.emptyCopies.add(`${DEVICE_ROOT}/sub/b.jpg`)
      const stats = yield* _(reconcileCopy(pullParams(world)))
      expect(stats).toEqual(makeStats({ copied: 2, renamed: 1, folders: 2, errors: 1, bytes: 10 }))
    }))

  it("never deletes", () => {
    const name = fc.stringMatching(/^[a-d]\.(jpg|png)$/)
    fc.assert(
      fc.property(fc.dictionary(name, fc.nat({ max: 50 })), fc.dictionary(name, fc.nat({ max: 50 })), (device, desktop) => {
        const files: Record<string, number> = {}
        for (const [file, size] of Object.entries(device)) {
          files[`${DEVICE_ROOT}/${file}`] = size
        }
        for (const [file, size] of Object.entries(desktop)) {
          files[`${DESKTOP_ROOT}/${file}`] = size
        }
        const world = makeWorld(files, [DEVICE_ROOT, DESKTOP_ROOT])
        const stats = Effect.runSync(reconcileCopy(pullParams(world)))
        expect(stats.deleted).toBe(0)
        expect(stats.copied).toBe(Object.keys(device).length)
        expect(filesBelow(world, DESKTOP_ROOT)).toHaveLength(Object.keys(device).length + Object.keys(desktop).length)
      })
    )
  })
})

const moveWorld = () =>
  makeWorld(
    {
      [`${DEVICE_ROOT}/a.jpg`]: 10,
      [`${DEVICE_ROOT}/sub/b.jpg`]: 20,
      [`${DEVICE_ROOT}/sub/c.jpg`]: 30
    },
    [DESKTOP_ROOT]
  )

describe("reconcileMove", () => {
  it.effect("deletes each verified source and prunes emptied directories", () =>
    Effect.gen(function*(_) {
      const world = moveWorld()
      const stats = yield* _(reconcileMove(pullParams(world)))
      expect(stats).toEqual(makeStats({ copied: 3, deleted: 3, folders: 1, bytes: 60 }))
      expect(filesBelow(world, DEVICE_ROOT)).toEqual([])
      expect(directoriesBelow(world, DEVICE_ROOT)).toEqual([])
      expect(world.entries.has(DEVICE_ROOT)).toBe(true)
      expect(filesBelow(world, DESKTOP_ROOT)).toEqual(["a.jpg:10", "sub/b.jpg:20", "sub/c.jpg:30"])
    }))

  it.effect("leaves exactly the file whose copy failed", () =>
    Effect.gen(function*(_) {
      const world = moveWorld()
      world.failCopy.add(`${DEVICE_ROOT}/sub/c.jpg`)
      const stats = yield* _(reconcileMove(pullParams(world)))
      expect(stats).toEqual(makeStats({ copied: 2, deleted: 2, errors: 1, folders: 1, bytes: 30 }))
      expect(filesBelow(world, DEVICE_ROOT)).toEqual(["sub/c.jpg:30"])
      const removals = world.mutations.filter((mutation) => mutation.startsWith("remove"))
      expect(removals).toEqual([`remove ${DEVICE_ROOT}/sub/b.jpg`, `remove ${DEVICE_ROOT}/a.jpg`])
      const lastCopy = world.mutations.map((mutation) => mutation.startsWith("copy")).lastIndexOf(true)
      expect(lastCopy).toBeLessThan(world.mutations.indexOf(`remove ${DEVICE_ROOT}/sub/b.jpg`))
    }))

  it.effect("previews deletions without removing anything", () =>
    Effect.gen(function*(_) {
      const world = moveWorld()
      const stats = yield* _(reconcileMove(pullParams(world, { dryRun: true })))
      expect(stats).toEqual(makeStats({ copied: 3, deleted: 3, folders: 1, bytes: 60 }))
      expect(world.mutations).toEqual([])
    }))

  it.effect("counts a failed deletion as an error", () =>
    Effect.gen(function*(_) {
      const world = moveWorld()
      world.failRemove.add(`${DEVICE_ROOT}/a.jpg`)
      const stats = yield* _(reconcileMove(pullParams(world)))
      expect(stats).toEqual(makeStats({ copied: 3, deleted: 2, errors: 1, folders: 1, bytes: 60 }))
      expect(filesBelow(world, DEVICE_ROOT)).toEqual(["a.jpg:10"])
    }))

  it.effect("keeps a zero-byte source and counts it as an error", () =>
    Effect.gen(function*(_) {
      const world = makeWorld({ [`${DEVICE_ROOT}/a.jpg`]: 10, [`${DEVICE_ROOT}/empty.txt`]: 0 }, [DESKTOP_ROOT])
      const preview = yield* _(reconcileMove(pullParams(world, { dryRun: true })))
      expect(preview).toEqual(makeStats({ copied: 1, deleted: 1, errors: 1, bytes: 10 }))

      const stats = yield* _(reconcileMove(pullParams(world)))
      expect(stats).toEqual(makeStats({ copied: 1, deleted: 1, errors: 1, bytes: 10 }))
      expect(filesBelow(world, DEVICE_ROOT)).toEqual(["empty.txt:0"])
      expect(world.mutations.filter((mutation) => mutation.startsWith("remove"))).toEqual([
        `remove ${DEVICE_ROOT}/a.jpg`
      ])
    }))

  it("deletes only what it copied", () => {
    const files = ["a.jpg", "b.jpg", "sub/c.jpg", "sub/d.jpg", "e.jpg"]
    fc.assert(
      fc.property(fc.subarray(files), (failing) => {
        const world = makeWorld(
          Object.fromEntries(files.map((file) => [`${DEVICE_ROOT}/${file}`, 1])),
          [DESKTOP_ROOT]
        )
        for (const file of failing) {
          world.failCopy.add(`${DEVICE_ROOT}/${file}`)
        }
        const stats = Effect.runSync(reconcileMove(pullParams(world)))
        expect(stats.deleted).toBe(stats.copied)
        expect(stats.errors).toBe(failing.length)
        expect(filesBelow(world, DEVICE_ROOT)).toEqual([...failing].sort().map((file) => `${file}:1`))
      })
    )
  })
})
