import { Effect, Either, Option } from "effect"

import { makeStats, type TransferStats } from "../../core/stats.js"
import { joinRelative, type TreeEntry } from "../../core/tree.js"
import type { StorageError } from "../services/storage.js"
import { ensureDirectory, ignoreOutcome, makeStatsTracker, type StatsTracker, transferFile } from "./transfer.js"
import type { ReconcileParams } from "./types.js"
import { listEntries } from "./walker.js"

const forEach = Effect.forEach

interface Expected {
  readonly files: Set<string>
  readonly directories: Set<string>
}

const syncFile = (
  params: ReconcileParams,
  tracker: StatsTracker,
  entry: TreeEntry,
  sourceAddress: string,
  destinationAddress: string
): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    const existing = yield* _(params.destination.stat(destinationAddress))
    if (Option.exists(existing, (info) => info.kind === "file" && info.size === entry.size)) {
      yield* _(tracker.bump("skipped"))
      return
    }
    const outcome = yield* _(
      Effect.either(
        transferFile(params, {
          sourceAddress,
          destinationAddress,
          size: entry.size,
          overwrite: true,
          verify: "none"
        })
      )
    )
    if (Either.isLeft(outcome)) {
      yield* _(tracker.bump("errors"))
      yield* _(Effect.logWarning(`Failed to sync ${sourceAddress}: ${outcome.left.reason}`))
      return
    }
    yield* _(tracker.bump("copied"))
    yield* _(tracker.addBytes(entry.size))
  })

// pass 1: desktop -> device, recording every path that should survive
const pushLevel = (
  params: ReconcileParams,
  tracker: StatsTracker,
  expected: Expected,
  sourceDir: string,
  destinationDir: string,
  prefix: string
): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    const entries = yield* _(listEntries(params.source, sourceDir))
    yield* _(
      forEach(entries, (entry) =>
        Effect.gen(function*(_) {
          const relativePath = joinRelative(prefix, entry.name)
          const sourceAddress = params.source.child(sourceDir, entry.name)
          const destinationAddress = params.destination.child(destinationDir, entry.name)
          if (entry.kind === "file") {
            expected.files.add(relativePath)
            yield* _(syncFile(params, tracker, entry, sourceAddress, destinationAddress))
            return
          }
          expected.directories.add(relativePath)
          const created = yield* _(
            Effect.either(ensureDirectory(params.destination, destinationAddress, params.context))
          )
          if (Either.isLeft(created)) {
            yield* _(tracker.bump("errors"))
            yield* _(Effect.logWarning(`Skipping ${sourceAddress}: ${created.left.reason}`))
            return
          }
          yield* _(pushLevel(params, tracker, expected, sourceAddress, destinationAddress, relativePath))
        }), { discard: true })
    )
  })

const removeEntry = (
  params: ReconcileParams,
  tracker: StatsTracker,
  address: string,
  kind: TreeEntry["kind"]
): Effect.Effect<boolean> =>
  Effect.gen(function*(_) {
    if (params.context.dryRun) {
      yield* _(Effect.logDebug(`would delete ${address}`))
      yield* _(tracker.bump("deleted"))
      return true
    }
    const outcome = yield* _(Effect.either(params.destination.remove(address)))
    if (Either.isRight(outcome)) {
      yield* _(Effect.logDebug(`deleted ${address}`))
      yield* _(tracker.bump("deleted"))
      return true
    }
    if (kind === "file") {
      yield* _(tracker.bump("errors"))
      yield* _(Effect.logWarning(`Failed to delete ${address}: ${outcome.left.reason}`))
      return false
    }
    yield* _(ignoreOutcome(outcome, (error) => `${error.address}: ${error.reason}`))
    return false
  })

// pass 2: delete what the desktop no longer has; succeeds with true when the
// directory ends up (or, in a preview, would end up) empty
const pruneLevel = (
  params: ReconcileParams,
  tracker: StatsTracker,
  expected: Expected,
  directory: string,
  prefix: string
): Effect.Effect<boolean> =>
  Effect.gen(function*(_) {
    const entries = yield* _(listEntries(params.destination, directory))
    const removed = yield* _(
      forEach(entries, (entry) =>
        Effect.gen(function*(_) {
          const relativePath = joinRelative(prefix, entry.name)
          const address = params.destination.child(directory, entry.name)
          if (entry.kind === "file") {
            return expected.files.has(relativePath) ? false : yield* _(removeEntry(params, tracker, address, "file"))
          }
          const emptied = yield* _(pruneLevel(params, tracker, expected, address, relativePath))
          if (!emptied || expected.directories.has(relativePath)) {
            return false
          }
          return yield* _(removeEntry(params, tracker, address, "directory"))
        }))
    )
    return removed.every((flag) => flag)
  })

/**
 * Mirrors the desktop tree onto the device. Files whose size matches are left
 * alone; the second pass deletes device entries the desktop does not have.
 *
 * @invariant a missing desktop source deletes nothing and reports one error
 */
export const reconcileSync = (params: ReconcileParams): Effect.Effect<TransferStats, StorageError> =>
  Effect.gen(function*(_) {
    const root = yield* _(params.source.stat(params.sourceRoot))
    if (!Option.exists(root, (info) => info.kind === "directory")) {
      yield* _(Effect.logWarning(`Desktop source does not exist: ${params.sourceRoot}`))
      return makeStats({ errors: 1 })
    }
    const tracker = yield* _(makeStatsTracker)
    yield* _(ensureDirectory(params.destination, params.destinationRoot, params.context))
    const expected: Expected = { files: new Set(), directories: new Set() }
    yield* _(pushLevel(params, tracker, expected, params.sourceRoot, params.destinationRoot, ""))
    yield* _(pruneLevel(params, tracker, expected, params.destinationRoot, ""))
    return yield* _(tracker.snapshot)
  })
