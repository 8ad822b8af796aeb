import { Effect, Option, pipe } from "effect"

import { joinRelative, relativeSegments, sortEntries, type TreeEntry } from "../../core/tree.js"
import type { StorageAccess } from "../services/storage.js"

const forEach = Effect.forEach

/** Address of `relativePath` below `root`, joined the way the namespace joins names. */
export const addressOf = (access: StorageAccess, root: string, relativePath: string): string =>
  relativeSegments(relativePath).reduce((parent, segment) => access.child(parent, segment), root)

const describeChild = (
  access: StorageAccess,
  address: string,
  prefix: string,
  name: string
): Effect.Effect<Option.Option<TreeEntry>> =>
  pipe(
    access.stat(access.child(address, name)),
    Effect.map(Option.flatMap((info) =>
      info.kind === "other"
        ? Option.none()
        : Option.some({ name, relativePath: joinRelative(prefix, name), kind: info.kind, size: info.size })
    ))
  )

const listBelow = (
  access: StorageAccess,
  address: string,
  prefix: string
): Effect.Effect<ReadonlyArray<TreeEntry>> =>
  Effect.gen(function*(_) {
    const names = yield* _(access.list(address))
    const described = yield* _(forEach(names, (name) => describeChild(access, address, prefix, name)))
    return sortEntries(described.flatMap((entry) => Option.toArray(entry)))
  })

/**
 * Lists one directory level, directories first. Relative paths equal names.
 *
 * @effect the namespace behind `access`
 * @invariant an unreadable directory yields []
 */
export const listEntries = (access: StorageAccess, address: string): Effect.Effect<ReadonlyArray<TreeEntry>> =>
  listBelow(access, address, "")

const walkBelow = (
  access: StorageAccess,
  address: string,
  prefix: string
): Effect.Effect<ReadonlyArray<TreeEntry>> =>
  Effect.gen(function*(_) {
    const entries = yield* _(listBelow(access, address, prefix))
    const chunks = yield* _(
      forEach(entries, (entry) =>
        entry.kind === "directory"
          ? Effect.map(
            walkBelow(access, access.child(address, entry.name), entry.relativePath),
            (nested) => [entry, ...nested]
          )
          : Effect.succeed([entry]))
    )
    return chunks.flat()
  })

/**
 * Depth-first enumeration below `root`; each directory precedes its contents.
 *
 * @invariant relative paths use "/" whatever the namespace
 * @complexity O(n) probes where n = entries in the tree
 */
export const walkTree = (access: StorageAccess, root: string): Effect.Effect<ReadonlyArray<TreeEntry>> =>
  walkBelow(access, root, "")

export const walkFiles = (access: StorageAccess, root: string): Effect.Effect<ReadonlyArray<TreeEntry>> =>
  Effect.map(walkTree(access, root), (entries) => entries.filter((entry) => entry.kind === "file"))
