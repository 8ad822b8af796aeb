import type { PlatformError as PlatformErrorType } from "@effect/platform/Error"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Effect, Layer, Option, pipe } from "effect"

import {
  DesktopStorage,
  type StorageAccess,
  type StorageEntryInfo,
  type StorageEntryKind,
  type StorageError,
  storageError
} from "./storage.js"

const entryKindFromInfo = (info: FileSystem.File.Info): StorageEntryKind => {
  if (info.type === "Directory") {
    return "directory"
  }
  if (info.type === "File") {
    return "file"
  }
  return "other"
}

const describe = (error: PlatformErrorType): string =>
  error._tag === "SystemError" ? `${error.reason}: ${error.message}` : error.message

/**
 * Builds StorageAccess over the local filesystem.
 *
 * @pure false - filesystem IO
 * @effect FileSystem, Path
 * @invariant remove never deletes a non-empty directory
 */
export const makeLocalStorage = (name: string): Effect.Effect<StorageAccess, never, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)

    const list = (address: string): Effect.Effect<ReadonlyArray<string>> =>
      pipe(
        fs.readDirectory(address),
        Effect.catchAll(() => Effect.succeed<ReadonlyArray<string>>([]))
      )

    const stat = (address: string): Effect.Effect<Option.Option<StorageEntryInfo>> =>
      pipe(
        fs.stat(address),
        Effect.map((info) => Option.some({ kind: entryKindFromInfo(info), size: Number(info.size) })),
        Effect.catchAll(() => Effect.succeed(Option.none<StorageEntryInfo>()))
      )

    const copyFile = (
      source: string,
      destination: string,
      overwrite: boolean
    ): Effect.Effect<void, StorageError> =>
      Effect.gen(function*(_) {
        if (!overwrite) {
          const existing = yield* _(stat(destination))
          if (Option.isSome(existing)) {
            return yield* _(Effect.fail(storageError(destination, "Destination already exists")))
          }
        }
        yield* _(
          pipe(
            fs.copyFile(source, destination),
            Effect.mapError((error) => storageError(source, `Cannot copy file: ${describe(error)}`))
          )
        )
      })

    const remove = (address: string): Effect.Effect<void, StorageError> =>
      Effect.gen(function*(_) {
        const info = yield* _(stat(address))
        if (Option.isNone(info)) {
          return yield* _(Effect.fail(storageError(address, "Entry does not exist")))
        }
        if (info.value.kind === "directory") {
          const children = yield* _(list(address))
          if (children.length > 0) {
            return yield* _(Effect.fail(storageError(address, "Directory not empty")))
          }
        }
        yield* _(
          pipe(
            fs.remove(address, { recursive: info.value.kind === "directory" }),
            Effect.mapError((error) => storageError(address, `Cannot remove: ${describe(error)}`))
          )
        )
      })

    const makeDirectory = (address: string, createParents: boolean): Effect.Effect<void, StorageError> =>
      pipe(
        fs.makeDirectory(address, { recursive: createParents }),
        Effect.mapError((error) => storageError(address, `Cannot create directory: ${describe(error)}`))
      )

    return {
      name,
      child: (parent, entry) => path.join(parent, entry),
      list,
      stat,
      copyFile,
      remove,
      makeDirectory
    }
  })

export const DesktopStorageLive = Layer.effect(DesktopStorage, makeLocalStorage("desktop"))
