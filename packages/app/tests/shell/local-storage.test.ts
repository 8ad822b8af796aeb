import { NodeContext } from "@effect/platform-node"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"

import { makeLocalStorage } from "../../src/shell/services/local-storage.js"
import { readFile, withTempDir, writeFile } from "../support/fs-helpers.js"
import { settled } from "../support/settled.js"

describe("makeLocalStorage", () => {
  it.scoped("lists, stats and copies files", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const dir = yield* _(withTempDir)
      const storage = yield* _(makeLocalStorage("desktop"))
      yield* _(writeFile(path.join(dir, "a.txt"), "hello"))
      yield* _(storage.makeDirectory(path.join(dir, "nested", "deeper"), true))

      expect([...(yield* _(storage.list(dir)))].sort()).toEqual(["a.txt", "nested"])
      expect(yield* _(storage.stat(path.join(dir, "a.txt")))).toEqual(Option.some({ kind: "file", size: 5 }))
      const nested = yield* _(storage.stat(path.join(dir, "nested")))
      expect(Option.map(nested, (info) => info.kind)).toEqual(Option.some("directory"))
      expect(yield* _(storage.stat(path.join(dir, "missing")))).toEqual(Option.none())
      expect(yield* _(storage.list(path.join(dir, "missing")))).toEqual([])

      const copy = storage.child(path.join(dir, "nested", "deeper"), "b.txt")
      yield* _(storage.copyFile(path.join(dir, "a.txt"), copy, false))
      expect(yield* _(readFile(copy))).toBe("hello")
      const again = yield* _(Effect.either(storage.copyFile(path.join(dir, "a.txt"), copy, false)))
      expect(settled(again)).toEqual({
        left: { _tag: "StorageError", address: copy, reason: "Destination already exists" }
      })
      yield* _(storage.copyFile(path.join(dir, "a.txt"), copy, true))
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("removes files and empty directories only", () =>
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const dir = yield* _(withTempDir)
      const storage = yield* _(makeLocalStorage("desktop"))
      const folder = path.join(dir, "folder")
      yield* _(writeFile(path.join(folder, "x.txt"), "x"))

      const refused = yield* _(Effect.either(storage.remove(folder)))
      expect(settled(refused)).toEqual({
        left: { _tag: "StorageError", address: folder, reason: "Directory not empty" }
      })
      yield* _(storage.remove(path.join(folder, "x.txt")))
      yield* _(storage.remove(folder))
      expect(yield* _(storage.stat(folder))).toEqual(Option.none())
    }).pipe(Effect.provide(NodeContext.layer)))
})
